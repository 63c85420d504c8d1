import type { TriviaStore } from "../store/TriviaStore";
import {
  getCategoryMap,
  getQuestionsByCategory,
} from "../services/questionService";
import { idParamsSchema, parseRequest } from "../validation/requestSchemas";
import { asyncHandler } from "../utils/asyncHandler";

export const createCategoryController = (store: TriviaStore) => ({
  getCategories: asyncHandler(async (_req, res) => {
    const categories = await getCategoryMap(store);
    res.status(200).json({ success: true, categories });
  }),

  getCategoryQuestions: asyncHandler(async (req, res) => {
    const { id } = parseRequest(idParamsSchema, req.params);
    res.status(200).json(await getQuestionsByCategory(store, id));
  }),
});
