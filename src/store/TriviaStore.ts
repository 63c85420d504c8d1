import type {
  CategoryTypes,
  NewQuestion,
  QuestionFilter,
  QuestionTypes,
} from "../types/TriviaTypes";

/**
 * Persistence boundary for categories and questions.
 *
 * `getQuestion` and `deleteQuestion` reject with `NotFoundError` when no
 * question has the given id. Lists are ordered by id, which is insertion order.
 */
export interface TriviaStore {
  listCategories(): Promise<CategoryTypes[]>;
  getCategory(id: number): Promise<CategoryTypes | null>;
  createCategory(input: Omit<CategoryTypes, "id">): Promise<CategoryTypes>;

  createQuestion(input: NewQuestion): Promise<QuestionTypes>;
  getQuestion(id: number): Promise<QuestionTypes>;
  listQuestions(
    filter: QuestionFilter,
    offset?: number,
    limit?: number
  ): Promise<QuestionTypes[]>;
  countQuestions(filter?: QuestionFilter): Promise<number>;
  deleteQuestion(id: number): Promise<void>;

  clear(): Promise<void>;
}
