import type { FilterQuery } from "mongoose";
import { Category } from "../models/Category";
import { Counter, nextSequence } from "../models/Counter";
import { Question } from "../models/Question";
import type {
  CategoryTypes,
  NewQuestion,
  QuestionFilter,
  QuestionTypes,
} from "../types/TriviaTypes";
import { NotFoundError } from "../utils/errors";
import { escapeRegExp } from "../utils/escapeRegExp";
import type { TriviaStore } from "./TriviaStore";

// Fields sent to clients; keeps _id and __v out of responses
const QUESTION_FIELDS = "-_id id question answer category difficulty";
const CATEGORY_FIELDS = "-_id id type";

export const buildQuestionQuery = (
  filter: QuestionFilter
): FilterQuery<QuestionTypes> => {
  const query: FilterQuery<QuestionTypes> = {};

  if (filter.category !== undefined) query.category = filter.category;
  if (filter.search) {
    query.question = { $regex: escapeRegExp(filter.search), $options: "i" };
  }
  if (filter.excludeIds && filter.excludeIds.length > 0) {
    query.id = { $nin: filter.excludeIds };
  }

  return query;
};

export const mongoStore: TriviaStore = {
  async listCategories() {
    return Category.find()
      .select(CATEGORY_FIELDS)
      .sort({ id: 1 })
      .lean<CategoryTypes[]>();
  },

  async getCategory(id) {
    return Category.findOne({ id })
      .select(CATEGORY_FIELDS)
      .lean<CategoryTypes | null>();
  },

  async createCategory({ type }) {
    const id = await nextSequence("categories");
    await Category.create({ id, type });
    return { id, type };
  },

  async createQuestion(input: NewQuestion) {
    const id = await nextSequence("questions");
    const question: QuestionTypes = { id, ...input };
    await Question.create(question);
    return question;
  },

  async getQuestion(id) {
    const question = await Question.findOne({ id })
      .select(QUESTION_FIELDS)
      .lean<QuestionTypes | null>();
    if (!question) throw new NotFoundError();
    return question;
  },

  async listQuestions(filter, offset, limit) {
    let query = Question.find(buildQuestionQuery(filter))
      .select(QUESTION_FIELDS)
      .sort({ id: 1 });
    if (offset !== undefined) query = query.skip(offset);
    if (limit !== undefined) query = query.limit(limit);
    return query.lean<QuestionTypes[]>();
  },

  async countQuestions(filter = {}) {
    return Question.countDocuments(buildQuestionQuery(filter));
  },

  async deleteQuestion(id) {
    const { deletedCount } = await Question.deleteOne({ id });
    if (deletedCount === 0) throw new NotFoundError();
  },

  async clear() {
    await Promise.all([
      Category.deleteMany(),
      Question.deleteMany(),
      Counter.deleteMany(),
    ]);
  },
};
