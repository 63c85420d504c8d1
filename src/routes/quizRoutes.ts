import express from "express";
import { createQuizController } from "../controllers/quizController";
import { methodNotAllowed } from "../middleware/errorHandler";
import type { RandomSource } from "../services/quizService";
import type { TriviaStore } from "../store/TriviaStore";

export const quizRoutes = (store: TriviaStore, random?: RandomSource) => {
  const router = express.Router();
  const { playQuiz } = createQuizController(store, random);

  /**
   * @swagger
   * /quizzes:
   *   post:
   *     summary: Random question not among previous_questions
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [previous_questions]
   *             properties:
   *               previous_questions:
   *                 type: array
   *                 items: { type: integer }
   *               quiz_category:
   *                 description: 'Category id, "all", or { id, type } with id 0 for all'
   *     responses:
   *       200:
   *         description: A question, or null once every question has been asked
   *       400:
   *         description: Malformed body
   */
  router.post("/", playQuiz);
  router.all("/", methodNotAllowed);

  return router;
};
