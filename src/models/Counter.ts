import mongoose, { Schema } from "mongoose";

export interface CounterDocument {
  _id: string;
  seq: number;
}

// One row per entity name ("categories", "questions") holding the last id handed out
const counterSchema = new Schema<CounterDocument>({
  _id: { type: String, required: true },
  seq: { type: Number, required: true, default: 0 },
});

export const Counter = mongoose.model<CounterDocument>("Counter", counterSchema);

export const nextSequence = async (name: string): Promise<number> => {
  const counter = await Counter.findOneAndUpdate(
    { _id: name },
    { $inc: { seq: 1 } },
    { new: true, upsert: true }
  );
  return counter.seq;
};
