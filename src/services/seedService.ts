import { faker } from "@faker-js/faker";
import type { TriviaStore } from "../store/TriviaStore";
import type { NewQuestion } from "../types/TriviaTypes";

export interface SeedData {
  categories: string[];
  questions: NewQuestion[];
}

export interface SeedSummary {
  categories: number;
  questions: number;
}

// `--fake 25` or `--fake=25`
export const parseFakeCount = (args: string[]): number => {
  const index = args.findIndex(
    (arg) => arg === "--fake" || arg.startsWith("--fake=")
  );
  if (index === -1) return 0;

  const raw = args[index].includes("=")
    ? args[index].split("=")[1]
    : args[index + 1];
  const count = Number(raw);
  if (!Number.isInteger(count) || count < 0) {
    throw new Error(`--fake expects a non-negative integer, got "${raw}"`);
  }
  return count;
};

export const fakeQuestion = (categoryIds: number[]): NewQuestion => ({
  question: `${faker.lorem.sentence().replace(/\.$/, "")}?`,
  answer: faker.word.words({ count: { min: 1, max: 3 } }),
  category: faker.helpers.arrayElement(categoryIds),
  difficulty: faker.number.int({ min: 1, max: 5 }),
});

/**
 * Replaces everything in the store with `data`, plus `fakeCount` generated
 * questions. Category ids in `data.questions` are 1-based positions in
 * `data.categories`.
 */
export const seedStore = async (
  store: TriviaStore,
  data: SeedData,
  fakeCount = 0
): Promise<SeedSummary> => {
  await store.clear();

  const categoryIds: number[] = [];
  for (const type of data.categories) {
    const category = await store.createCategory({ type });
    categoryIds.push(category.id);
  }

  const questions = [
    ...data.questions,
    ...Array.from({ length: fakeCount }, () => fakeQuestion(categoryIds)),
  ];
  for (const question of questions) {
    await store.createQuestion(question);
  }

  return { categories: categoryIds.length, questions: questions.length };
};
