import type { FastifyBaseLogger } from "fastify";

// The part of Fastify's logger used outside request handlers.
export type Logger = Pick<FastifyBaseLogger, "debug" | "info" | "warn" | "error">;
