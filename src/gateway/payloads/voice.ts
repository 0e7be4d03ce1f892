import { VoiceServerSchema, VoiceStateSchema } from '../../models/voice.js';

export const VoiceStateUpdateSchema = VoiceStateSchema;
export const VoiceServerUpdateSchema = VoiceServerSchema;
