import express from "express";
import { createQuestionController } from "../controllers/questionController";
import { methodNotAllowed } from "../middleware/errorHandler";
import type { TriviaStore } from "../store/TriviaStore";

export const questionRoutes = (store: TriviaStore) => {
  const router = express.Router();
  const controller = createQuestionController(store);

  /**
   * @swagger
   * /questions:
   *   get:
   *     summary: Ten questions per page, optionally filtered
   *     parameters:
   *       - in: query
   *         name: page
   *         schema:
   *           type: integer
   *           default: 1
   *       - in: query
   *         name: current_category
   *         schema:
   *           type: integer
   *       - in: query
   *         name: search
   *         schema:
   *           type: string
   *     responses:
   *       200:
   *         description: Success
   *       404:
   *         description: No questions stored, or unknown category
   *   post:
   *     summary: Add a question
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [question, answer, difficulty, category]
   *             properties:
   *               question: { type: string }
   *               answer: { type: string }
   *               difficulty: { type: integer }
   *               category: { type: integer }
   *     responses:
   *       200:
   *         description: Created
   *       400:
   *         description: Missing or invalid field
   *       422:
   *         description: Unknown category
   */
  router.get("/", controller.getQuestions);
  router.post("/", controller.createQuestion);
  router.all("/", methodNotAllowed);

  /**
   * @swagger
   * /questions/search:
   *   post:
   *     summary: Case-insensitive search in question text
   *     requestBody:
   *       required: true
   *       content:
   *         application/json:
   *           schema:
   *             type: object
   *             required: [search]
   *             properties:
   *               search: { type: string }
   *     responses:
   *       200:
   *         description: Success
   *       400:
   *         description: Missing search term
   */
  router.post("/search", controller.searchQuestions);
  router.all("/search", methodNotAllowed);

  /**
   * @swagger
   * /questions/{id}:
   *   get:
   *     summary: A single question
   *     responses:
   *       200:
   *         description: Success
   *       404:
   *         description: Not found
   *   delete:
   *     summary: Delete a question
   *     responses:
   *       200:
   *         description: Deleted
   *       404:
   *         description: Not found
   */
  router.get("/:id", controller.getQuestion);
  router.delete("/:id", controller.deleteQuestion);
  router.all("/:id", methodNotAllowed);

  return router;
};
