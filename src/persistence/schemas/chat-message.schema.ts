import { Prop, Schema, SchemaFactory } from '@nestjs/mongoose';
import { Document, Types } from 'mongoose';

/**
 * One stored conversation turn
 */
export interface ChatMessageDocument extends Document {
  _id: Types.ObjectId;
  sessionId: string;
  messageId: string;
  userMessage: string;
  assistantMessage: string;
  tokens: number;
  processingTimeMs: number;
  modelInfo?: Record<string, unknown>;
  topic?: string;
  sources: Record<string, unknown>[];
  timestamp: Date;
  createdAt: Date;
  updatedAt: Date;
}

@Schema({
  timestamps: true,
  collection: 'chat_messages',
})
export class ChatMessage {
  @Prop({ required: true, index: true })
  sessionId!: string;

  @Prop({ required: true })
  messageId!: string;

  @Prop({ required: true })
  userMessage!: string;

  @Prop({ required: true })
  assistantMessage!: string;

  @Prop({ default: 0 })
  tokens!: number;

  @Prop({ default: 0 })
  processingTimeMs!: number;

  @Prop({ type: Object })
  modelInfo?: Record<string, unknown>;

  @Prop()
  topic?: string;

  @Prop({ type: [Object], default: [] })
  sources!: Record<string, unknown>[];

  @Prop({ required: true })
  timestamp!: Date;
}

export const ChatMessageSchema = SchemaFactory.createForClass(ChatMessage);

// A retried write of the same turn collides here instead of duplicating it
ChatMessageSchema.index({ sessionId: 1, messageId: 1 }, { unique: true });
