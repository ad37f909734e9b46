// src/models/SessionMemory.ts
import mongoose, { Schema, Document } from 'mongoose';
import { config } from '../core/config';
import type { ConversationTurn, Dataset, TurnSummary } from '../types';

export interface ISessionMemory extends Document {
  sessionId: string;
  turnCount: number;
  summaries: TurnSummary[];
  turns: ConversationTurn[];
  workingDataset: Dataset | null;
  createdAt: Date;
  updatedAt: Date;
}

const TurnSummarySchema = new Schema({
  turn: { type: Number, required: true, min: 1 },
  summary: { type: String, required: true },
  dataQuery: { type: Schema.Types.Mixed, default: null },
  createdAt: { type: String, required: true },
}, { _id: false });

const ConversationTurnSchema = new Schema({
  role: { type: String, enum: ['user', 'assistant'], required: true },
  content: { type: String, required: true },
  timestamp: { type: String, required: true },
}, { _id: false });

const SessionMemorySchema = new Schema<ISessionMemory>(
  {
    sessionId: { type: String, required: true, unique: true, index: true },
    turnCount: { type: Number, default: 0 },
    summaries: { type: [TurnSummarySchema], default: [] },
    turns: { type: [ConversationTurnSchema], default: [] },
    // stored as-is; columns and rows are validated when the dataset is produced
    workingDataset: { type: Schema.Types.Mixed, default: null },
  },
  {
    timestamps: true,
    collection: config.mongodb.memoryCollection,
    minimize: false,
  }
);

SessionMemorySchema.index({ updatedAt: -1 });

export const SessionMemory = mongoose.model<ISessionMemory>('SessionMemory', SessionMemorySchema);
