import type { TriviaStore } from "../store/TriviaStore";
import { nextQuizQuestion, type RandomSource } from "../services/quizService";
import { parseRequest, quizRequestSchema } from "../validation/requestSchemas";
import { asyncHandler } from "../utils/asyncHandler";

export const createQuizController = (
  store: TriviaStore,
  random: RandomSource = Math.random
) => ({
  playQuiz: asyncHandler(async (req, res) => {
    const { previous_questions, quiz_category } = parseRequest(
      quizRequestSchema,
      req.body
    );
    const question = await nextQuizQuestion(
      store,
      { previousQuestions: previous_questions, category: quiz_category },
      random
    );
    res.status(200).json({ success: true, question });
  }),
});
