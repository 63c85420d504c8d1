import { z } from "zod";
import { BadRequestError } from "../utils/errors";

// HTML forms and query strings send numbers as strings
const integer = z
  .union([
    z.number().int(),
    z.string().trim().regex(/^-?\d+$/).transform(Number),
  ])
  .pipe(z.number().int().safe());

const positiveId = integer.pipe(z.number().int().positive());

export const idParamsSchema = z.object({
  id: positiveId,
});

export const questionPageQuerySchema = z.object({
  page: positiveId.optional(),
  current_category: positiveId.optional(),
  search: z.string().optional(),
});

export const createQuestionSchema = z.object({
  question: z.string().trim().min(1),
  answer: z.string().trim().min(1),
  difficulty: integer,
  category: positiveId,
});

export const searchQuestionsSchema = z.object({
  search: z.string().min(1),
});

// The web client sends `{ id, type }`, with id 0 standing for "all"
const quizCategorySchema = z
  .union([
    z.literal("all"),
    z
      .object({ id: integer, type: z.string().optional() })
      .transform(({ id }) => id),
    integer,
  ])
  .nullish()
  .transform((value) =>
    value === undefined || value === null || value === "all" || value === 0
      ? undefined
      : value
  )
  .pipe(z.number().int().positive().optional());

export const quizRequestSchema = z.object({
  previous_questions: z.array(positiveId),
  quiz_category: quizCategorySchema,
});

export const describeIssues = (error: z.ZodError): string[] =>
  error.issues.map(({ path, message }) =>
    path.length > 0 ? `${path.join(".")}: ${message}` : message
  );

export const parseRequest = <Schema extends z.ZodTypeAny>(
  schema: Schema,
  value: unknown
): z.output<Schema> => {
  const result = schema.safeParse(value);
  if (!result.success) throw new BadRequestError(describeIssues(result.error));
  return result.data;
};
