import { fileURLToPath } from "node:url";
import swaggerJsdoc from "swagger-jsdoc";

const routesGlob = fileURLToPath(new URL("./routes/*.ts", import.meta.url));
const appFile = fileURLToPath(new URL("./app.ts", import.meta.url));

export const swaggerSpec = swaggerJsdoc({
  definition: {
    openapi: "3.0.0",
    info: {
      title: "Promotions Service API",
      version: "1.0.0",
      description: "Create, list, update, deactivate and delete product promotions.",
    },
  },
  apis: [routesGlob, appFile],
});
