import mongoose from 'mongoose';

export interface KnownSetSnapshotEntry {
  sku: string;
  seen: boolean;
  discontinued: boolean;
  lastPrice?: number;
}

export interface KnownSetSnapshot {
  name: string;
  entries: KnownSetSnapshotEntry[];
  updatedAt: Date;
}

const knownSetSnapshotEntrySchema = new mongoose.Schema(
  {
    sku: { required: true, type: String },
    seen: { required: true, type: Boolean },
    discontinued: { required: true, type: Boolean },
    lastPrice: { type: Number },
  },
  { _id: false }
);

const knownSetSnapshotSchema = new mongoose.Schema({
  name: { required: true, type: String, unique: true },
  entries: { type: [knownSetSnapshotEntrySchema], default: [] },
  updatedAt: { required: true, type: Date },
});

export const MKnownSetSnapshot = mongoose.model(
  'KnownSetSnapshot',
  knownSetSnapshotSchema
);
