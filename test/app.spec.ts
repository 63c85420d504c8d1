import type { Server } from "http";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { createApp } from "../src/app";
import { apiBodySchema } from "./support/apiBody";
import { type MemoryStore, createSeededStore } from "./support/memoryStore";

let server: Server;
let baseUrl: string;
let store: MemoryStore;

const startServer = (random?: () => number) =>
  new Promise<void>((resolve) => {
    server = createApp(store, { logRequests: false, random }).listen(0, () => {
      const address = server.address();
      if (address && typeof address === "object") {
        baseUrl = `http://127.0.0.1:${address.port}`;
      }
      resolve();
    });
  });

const request = async (method: string, path: string, body?: unknown) => {
  const response = await fetch(`${baseUrl}${path}`, {
    method,
    headers:
      body === undefined ? undefined : { "Content-Type": "application/json" },
    body: body === undefined ? undefined : JSON.stringify(body),
  });
  return {
    status: response.status,
    body: apiBodySchema.parse(await response.json()),
  };
};

beforeEach(async () => {
  store = await createSeededStore(15);
  await startServer(() => 0);
});

afterEach(
  () =>
    new Promise<void>((resolve, reject) => {
      server.close((error) => (error ? reject(error) : resolve()));
    })
);

describe("GET /categories", () => {
  it("returns the id to name map", async () => {
    const { status, body } = await request("GET", "/categories");
    expect(status).toBe(200);
    expect(body).toEqual({
      success: true,
      categories: { 1: "Science", 2: "Art", 3: "Geography", 4: "History" },
    });
  });
});

describe("GET /questions", () => {
  it("pages ten questions at a time", async () => {
    const first = await request("GET", "/questions?page=1");
    const second = await request("GET", "/questions?page=2");

    expect(first.status).toBe(200);
    expect(first.body.success).toBe(true);
    expect(first.body.questions).toHaveLength(10);
    expect(first.body.total_questions).toBe(15);
    expect(first.body.current_category).toBeNull();
    expect(first.body.questions?.[0]).toEqual({
      id: 1,
      question: "Sample question 1?",
      answer: "Answer 1",
      category: 1,
      difficulty: 2,
    });
    expect(second.body.questions?.map((q) => q.id)).toEqual([
      11, 12, 13, 14, 15,
    ]);
  });

  it("orders results the same way on repeated calls", async () => {
    const a = await request("GET", "/questions?page=1");
    const b = await request("GET", "/questions?page=1");
    expect(a.body.questions).toEqual(b.body.questions);
  });

  it("returns an empty page past the end", async () => {
    const { status, body } = await request("GET", "/questions?page=1000");
    expect(status).toBe(200);
    expect(body.questions).toEqual([]);
  });

  it("is 404 when there are no questions", async () => {
    await store.clear();
    const { status, body } = await request("GET", "/questions");
    expect(status).toBe(404);
    expect(body).toEqual({ success: false, error: 404, message: "not found" });
  });

  it("is 404 for an unknown current_category", async () => {
    const { status } = await request("GET", "/questions?current_category=1000");
    expect(status).toBe(404);
  });

  it("is 400 for a bad page number", async () => {
    const { status, body } = await request("GET", "/questions?page=abc");
    expect(status).toBe(400);
    expect(body.message).toBe("invalid request");
  });
});

describe("POST /questions", () => {
  const newQuestion = {
    question: "Which element has the symbol Fe?",
    answer: "Iron",
    difficulty: 2,
    category: 1,
  };

  it("creates a question", async () => {
    const { status, body } = await request("POST", "/questions", newQuestion);
    expect(status).toBe(200);
    expect(body).toEqual({ success: true, created: 16 });
    expect(await store.countQuestions()).toBe(16);
  });

  it("is 400 without an answer and stores nothing", async () => {
    const { answer: _answer, ...withoutAnswer } = newQuestion;
    const { status, body } = await request("POST", "/questions", withoutAnswer);
    expect(status).toBe(400);
    expect(body).toEqual({
      success: false,
      error: 400,
      message: "invalid request",
      details: ["answer: Required"],
    });
    expect(await store.countQuestions()).toBe(15);
  });

  it("is 422 for an unknown category", async () => {
    const { status, body } = await request("POST", "/questions", {
      ...newQuestion,
      category: 1000,
    });
    expect(status).toBe(422);
    expect(body.message).toBe("could not process the request");
    expect(await store.countQuestions()).toBe(15);
  });

  it("is 400 for malformed JSON", async () => {
    const response = await fetch(`${baseUrl}/questions`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: "{not json",
    });
    expect(response.status).toBe(400);
    expect(await response.json()).toEqual({
      success: false,
      error: 400,
      message: "invalid request",
    });
  });

  it("can be found by searching its text in another case", async () => {
    await request("POST", "/questions", newQuestion);
    const { status, body } = await request("POST", "/questions/search", {
      search: "WHICH ELEMENT has the SYMBOL fe",
    });
    expect(status).toBe(200);
    expect(body.questions).toEqual([{ id: 16, ...newQuestion }]);
    expect(body.total_questions).toBe(1);
    expect(body.current_category).toBeNull();
    expect(body.categories).toEqual({
      1: "Science",
      2: "Art",
      3: "Geography",
      4: "History",
    });
  });
});

describe("POST /questions/search", () => {
  it("is 400 without a search term", async () => {
    const { status } = await request("POST", "/questions/search", {});
    expect(status).toBe(400);
  });

  it("is 405 for GET", async () => {
    const { status, body } = await request("GET", "/questions/search");
    expect(status).toBe(405);
    expect(body).toEqual({
      success: false,
      error: 405,
      message: "method not allowed",
    });
  });
});

describe("GET and DELETE /questions/:id", () => {
  it("returns a single question", async () => {
    const { status, body } = await request("GET", "/questions/4");
    expect(status).toBe(200);
    expect(body.question?.id).toBe(4);
  });

  it("deletes, after which the id is not found", async () => {
    const deleted = await request("DELETE", "/questions/4");
    expect(deleted).toEqual({
      status: 200,
      body: { success: true, deleted: 4 },
    });

    const fetched = await request("GET", "/questions/4");
    expect(fetched.status).toBe(404);

    const again = await request("DELETE", "/questions/4");
    expect(again.status).toBe(404);
    expect(again.body.success).toBe(false);
  });

  it("is 404 for an id that never existed", async () => {
    const { status } = await request("DELETE", "/questions/1000");
    expect(status).toBe(404);
  });
});

describe("GET /category/:id/questions", () => {
  it("lists the questions of one category", async () => {
    const { status, body } = await request("GET", "/category/2/questions");
    expect(status).toBe(200);
    expect(body.questions?.map((q) => q.id)).toEqual([
      2, 6, 10, 14,
    ]);
    expect(body.total_questions).toBe(4);
    expect(body.current_category).toBeNull();
  });

  it("answers on the plural path too", async () => {
    const { status, body } = await request("GET", "/categories/2/questions");
    expect(status).toBe(200);
    expect(body.total_questions).toBe(4);
  });

  it("is 404 for an unknown category", async () => {
    const { status } = await request("GET", "/category/99/questions");
    expect(status).toBe(404);
  });
});

describe("POST /quizzes", () => {
  it("returns a question outside previous_questions", async () => {
    const { status, body } = await request("POST", "/quizzes", {
      previous_questions: [1, 2],
      quiz_category: { type: "click", id: 0 },
    });
    expect(status).toBe(200);
    expect(body.success).toBe(true);
    expect(body.question?.id).toBe(3);
  });

  it("stays inside the chosen category", async () => {
    const { body } = await request("POST", "/quizzes", {
      previous_questions: [4],
      quiz_category: { type: "History", id: 4 },
    });
    expect(body.question).toEqual({
      id: 8,
      question: "Sample question 8?",
      answer: "Answer 8",
      category: 4,
      difficulty: 4,
    });
  });

  it("returns null once the category is exhausted", async () => {
    const { status, body } = await request("POST", "/quizzes", {
      previous_questions: [4, 8, 12],
      quiz_category: 4,
    });
    expect(status).toBe(200);
    expect(body).toEqual({ success: true, question: null });
  });

  it("is 400 for a malformed body", async () => {
    const { status } = await request("POST", "/quizzes", {
      previous_questions: "none",
    });
    expect(status).toBe(400);
  });
});

describe("misc routes", () => {
  it("answers the health check", async () => {
    const response = await fetch(`${baseUrl}/healthcheck`);
    expect(response.status).toBe(200);
    expect(await response.text()).toBe("OK");
  });

  it("is 404 JSON for unknown routes", async () => {
    const { status, body } = await request("GET", "/nowhere");
    expect(status).toBe(404);
    expect(body).toEqual({ success: false, error: 404, message: "not found" });
  });
});

describe("storage failures", () => {
  it("answers 500 and keeps serving", async () => {
    const consoleError = vi.spyOn(console, "error").mockImplementation(() => {});
    store.listCategories = async () => {
      throw new Error("connection refused");
    };

    const { status, body } = await request("GET", "/categories");
    expect(status).toBe(500);
    expect(body).toEqual({
      success: false,
      error: 500,
      message: "internal server error",
    });
    expect(consoleError).toHaveBeenCalledTimes(1);
    consoleError.mockRestore();

    const next = await request("GET", "/questions/1");
    expect(next.status).toBe(200);
    expect(next.body.question?.id).toBe(1);
  });
});

describe("CORS", () => {
  it("answers a preflight with the allowed methods and headers", async () => {
    const response = await fetch(`${baseUrl}/questions`, {
      method: "OPTIONS",
      headers: {
        Origin: "http://localhost:3000",
        "Access-Control-Request-Method": "POST",
        "Access-Control-Request-Headers": "Content-Type",
      },
    });
    expect(response.status).toBe(204);
    expect(response.headers.get("access-control-allow-origin")).toBe("*");
    expect(response.headers.get("access-control-allow-methods")).toBe(
      "GET,POST,DELETE,OPTIONS"
    );
    expect(response.headers.get("access-control-allow-headers")).toBe(
      "Content-Type,Authorization"
    );
  });
});

describe("GET /api-docs", () => {
  it("serves the Swagger UI page", async () => {
    const response = await fetch(`${baseUrl}/api-docs/`);
    expect(response.status).toBe(200);
    expect(response.headers.get("content-type")).toContain("text/html");
  });
});
