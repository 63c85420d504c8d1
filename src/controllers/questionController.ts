import type { TriviaStore } from "../store/TriviaStore";
import {
  addQuestion,
  getQuestion,
  getQuestionPage,
  removeQuestion,
  searchQuestions,
} from "../services/questionService";
import {
  createQuestionSchema,
  idParamsSchema,
  parseRequest,
  questionPageQuerySchema,
  searchQuestionsSchema,
} from "../validation/requestSchemas";
import { asyncHandler } from "../utils/asyncHandler";

export const createQuestionController = (store: TriviaStore) => ({
  getQuestions: asyncHandler(async (req, res) => {
    const { page, current_category, search } = parseRequest(
      questionPageQuerySchema,
      req.query
    );
    const result = await getQuestionPage(store, {
      page,
      category: current_category,
      search,
    });
    res.status(200).json(result);
  }),

  getQuestion: asyncHandler(async (req, res) => {
    const { id } = parseRequest(idParamsSchema, req.params);
    const question = await getQuestion(store, id);
    res.status(200).json({ success: true, question });
  }),

  createQuestion: asyncHandler(async (req, res) => {
    const input = parseRequest(createQuestionSchema, req.body);
    const question = await addQuestion(store, input);
    console.log(
      `Question ${question.id} created in category ${question.category}`
    );
    res.status(200).json({ success: true, created: question.id });
  }),

  searchQuestions: asyncHandler(async (req, res) => {
    const { search } = parseRequest(searchQuestionsSchema, req.body);
    res.status(200).json(await searchQuestions(store, search));
  }),

  deleteQuestion: asyncHandler(async (req, res) => {
    const { id } = parseRequest(idParamsSchema, req.params);
    await removeQuestion(store, id);
    console.log(`Question ${id} deleted`);
    res.status(200).json({ success: true, deleted: id });
  }),
});
