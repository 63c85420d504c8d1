import mongoose, { Schema } from "mongoose";
import type { QuestionTypes } from "../types/TriviaTypes";

const questionSchema = new Schema<QuestionTypes>({
  id: { type: Number, required: true, unique: true },
  question: { type: String, required: true },
  answer: { type: String, required: true },
  category: { type: Number, required: true, index: true }, // Category id, not a ref
  difficulty: { type: Number, required: true },
});

export const Question = mongoose.model<QuestionTypes>("Question", questionSchema);
