import mongoose, { Schema } from "mongoose";
import type { CategoryTypes } from "../types/TriviaTypes";

const categorySchema = new Schema<CategoryTypes>({
  id: { type: Number, required: true, unique: true },
  type: { type: String, required: true },
});

export const Category = mongoose.model<CategoryTypes>("Category", categorySchema);
