/**
 * Validation Middleware
 *
 * Zod-based request validation for body and params. Failures are forwarded
 * to the error middleware as a ValidationError.
 */

import type { Request, Response, NextFunction, RequestHandler } from "express";
import { z, ZodError, type ZodSchema } from "zod";
import { ValidationError } from "../utils/errorHandler";

export interface ValidationSchemas {
  body?: ZodSchema;
  params?: ZodSchema<Record<string, string>>;
}

/**
 * @example
 * app.post("/api/sessions/:sessionId/turns",
 *   validate({ params: sessionSchemas.params, body: sessionSchemas.turn }),
 *   async (req, res) => { ... }
 * );
 */
export function validate(schemas: ValidationSchemas): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    try {
      if (schemas.params) {
        req.params = schemas.params.parse(req.params);
      }
      if (schemas.body) {
        req.body = schemas.body.parse(req.body);
      }
      next();
    } catch (error) {
      if (error instanceof ZodError) {
        const messages = error.errors.map(e => `${e.path.join(".")}: ${e.message}`).join(", ");
        next(new ValidationError(messages));
      } else {
        next(error);
      }
    }
  };
}

export const sessionSchemas = {
  params: z.object({
    sessionId: z.string().trim().min(1, "sessionId is required"),
  }),
  turn: z.object({
    userId: z.string().trim().min(1, "userId is required"),
    userInput: z.string().refine(input => input.trim().length > 0, "userInput must not be empty"),
  }),
  resume: z.object({
    userId: z.string().trim().min(1).optional(),
  }),
};
