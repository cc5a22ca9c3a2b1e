import mongoose, { Document, Schema } from 'mongoose';

import { StoreEntry } from '../storage/keyValueStore';

export interface ICustodySnapshot extends Document {
  key: string;
  version: number;
  takenAt: Date;
  stores: Record<string, StoreEntry[]>;
  createdAt: Date;
  updatedAt: Date;
}

const custodySnapshotSchema = new Schema<ICustodySnapshot>(
  {
    key: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    version: {
      type: Number,
      required: true,
      min: 0,
    },
    takenAt: {
      type: Date,
      required: true,
    },
    // Store name -> ordered [{ key, value }] entries. Kept as arrays because
    // record ids may contain characters MongoDB does not allow in field names.
    stores: {
      type: Schema.Types.Mixed,
      required: true,
    },
  },
  {
    timestamps: true,
    minimize: false,
  }
);

export const CustodySnapshot = mongoose.model<ICustodySnapshot>(
  'CustodySnapshot',
  custodySnapshotSchema
);
