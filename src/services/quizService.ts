import type { TriviaStore } from "../store/TriviaStore";
import type { QuestionTypes } from "../types/TriviaTypes";

export interface QuizRound {
  previousQuestions: number[];
  // undefined means every category
  category?: number;
}

export type RandomSource = () => number;

export const pickRandom = <T>(
  items: readonly T[],
  random: RandomSource = Math.random
): T | null => {
  if (items.length === 0) return null;
  const index = Math.min(Math.floor(random() * items.length), items.length - 1);
  return items[index];
};

// Stateless: repeats are avoided only for the ids the caller sends back
export const nextQuizQuestion = async (
  store: TriviaStore,
  { previousQuestions, category }: QuizRound,
  random: RandomSource = Math.random
): Promise<QuestionTypes | null> => {
  const candidates = await store.listQuestions({
    category,
    excludeIds: previousQuestions,
  });
  return pickRandom(candidates, random);
};
