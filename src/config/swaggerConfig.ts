import path from "path";
import swaggerJsdoc, { type Options } from "swagger-jsdoc";

const options: Options = {
  definition: {
    openapi: "3.0.0",
    info: {
      title: "Trivia API",
      version: "1.0.0",
      description: "Questions, categories and quiz play for the trivia web client",
    },
  },
  // route files carry the @swagger blocks; .js once compiled
  apis: [path.join(__dirname, "../routes/*.{ts,js}")],
};

const swaggerSpec = swaggerJsdoc(options);

export default swaggerSpec;
