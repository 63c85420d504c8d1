import express from "express";
import { createCategoryController } from "../controllers/categoryController";
import { methodNotAllowed } from "../middleware/errorHandler";
import type { TriviaStore } from "../store/TriviaStore";

export const categoryRoutes = (store: TriviaStore) => {
  const router = express.Router();
  const { getCategories, getCategoryQuestions } = createCategoryController(store);

  /**
   * @swagger
   * /categories:
   *   get:
   *     summary: Map of category id to category name
   *     responses:
   *       200:
   *         description: Success
   */
  router.get("/", getCategories);
  router.all("/", methodNotAllowed);

  /**
   * @swagger
   * /category/{id}/questions:
   *   get:
   *     summary: All questions in a category
   *     parameters:
   *       - in: path
   *         name: id
   *         required: true
   *         schema:
   *           type: integer
   *     responses:
   *       200:
   *         description: Success
   *       404:
   *         description: Unknown category
   */
  router.get("/:id/questions", getCategoryQuestions);
  router.all("/:id/questions", methodNotAllowed);

  return router;
};
