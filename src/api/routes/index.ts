import type { FastifyInstance } from "fastify";
import { registerAnswerRoutes, type AnswerRoutesDependencies } from "./answer.js";

export interface ApiRoutesDependencies {
  answer?: AnswerRoutesDependencies;
}

export async function registerApiRoutes(app: FastifyInstance, dependencies?: ApiRoutesDependencies): Promise<void> {
  await registerAnswerRoutes(app, dependencies?.answer);
}
