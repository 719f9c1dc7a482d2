import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

/**
 * Per-session aggregate counters
 */
export interface ChatSessionDocument extends Document {
  _id: Types.ObjectId;
  sessionId: string;
  metadata: Record<string, unknown>;
  startedAt: Date;
  messageCount: number;
  totalTokens: number;
  totalProcessingTimeMs: number;
  lastAccessedAt: Date;
  createdAt: Date;
  updatedAt: Date;
}

@Schema({
  timestamps: true,
  collection: 'chat_sessions',
})
export class ChatSession {
  @Prop({ required: true, unique: true, index: true })
  sessionId!: string;

  @Prop({ type: Object, default: {} })
  metadata!: Record<string, unknown>;

  @Prop()
  startedAt!: Date;

  @Prop({ default: 0 })
  messageCount!: number;

  @Prop({ default: 0 })
  totalTokens!: number;

  @Prop({ default: 0 })
  totalProcessingTimeMs!: number;

  @Prop()
  lastAccessedAt!: Date;
}

export const ChatSessionSchema = SchemaFactory.createForClass(ChatSession);
