import type { TriviaStore } from "../store/TriviaStore";
import type {
  CategoryMap,
  NewQuestion,
  QuestionFilter,
  QuestionListResponse,
  QuestionTypes,
} from "../types/TriviaTypes";
import { NotFoundError, UnprocessableEntityError } from "../utils/errors";

export const PAGE_SIZE = 10;

export interface QuestionPageParams {
  page?: number;
  category?: number;
  search?: string;
}

export const getCategoryMap = async (store: TriviaStore): Promise<CategoryMap> => {
  const categories = await store.listCategories();
  return Object.fromEntries(categories.map(({ id, type }) => [id, type]));
};

/**
 * One page of questions, `PAGE_SIZE` at a time, 1-based.
 *
 * A page past the end is empty rather than an error; only an empty question
 * table or an unknown category is reported as not found.
 */
export const getQuestionPage = async (
  store: TriviaStore,
  { page = 1, category, search }: QuestionPageParams
): Promise<QuestionListResponse> => {
  const total = await store.countQuestions();
  if (total === 0) throw new NotFoundError();

  if (category !== undefined && !(await store.getCategory(category))) {
    throw new NotFoundError();
  }

  const filter: QuestionFilter = { category, search };
  const offset = (page - 1) * PAGE_SIZE;

  const [questions, totalQuestions, categories] = await Promise.all([
    store.listQuestions(filter, offset, PAGE_SIZE),
    search || category !== undefined ? store.countQuestions(filter) : total,
    getCategoryMap(store),
  ]);

  return {
    success: true,
    questions,
    total_questions: totalQuestions,
    categories,
    current_category: category ?? null,
  };
};

export const getQuestionsByCategory = async (
  store: TriviaStore,
  categoryId: number
): Promise<QuestionListResponse> => {
  const category = await store.getCategory(categoryId);
  if (!category) throw new NotFoundError();

  const questions = await store.listQuestions({ category: category.id });

  return {
    success: true,
    questions,
    total_questions: questions.length,
    current_category: null,
  };
};

export const searchQuestions = async (
  store: TriviaStore,
  term: string
): Promise<QuestionListResponse> => {
  const [questions, categories] = await Promise.all([
    store.listQuestions({ search: term }),
    getCategoryMap(store),
  ]);

  return {
    success: true,
    questions,
    total_questions: questions.length,
    categories,
    current_category: null,
  };
};

export const addQuestion = async (
  store: TriviaStore,
  input: NewQuestion
): Promise<QuestionTypes> => {
  if (!(await store.getCategory(input.category))) {
    throw new UnprocessableEntityError();
  }
  return store.createQuestion(input);
};

export const getQuestion = (store: TriviaStore, id: number) =>
  store.getQuestion(id);

export const removeQuestion = (store: TriviaStore, id: number) =>
  store.deleteQuestion(id);
