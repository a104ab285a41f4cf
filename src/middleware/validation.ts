import { Request, Response, NextFunction } from "express";
import { z, ZodType } from "zod";

type Middleware = (req: Request, res: Response, next: NextFunction) => void;

const sendValidationError = (res: Response, error: z.ZodError): void => {
  const errors = error.issues.map((err: z.core.$ZodIssue) => ({
    field: err.path.join("."),
    message: err.message,
  }));

  res.status(400).json({
    error: "validation_error",
    details: errors,
  });
};

/**
 * Validation middleware factory
 * Creates middleware that validates request body against a Zod schema
 */
export const validateBody = <T extends ZodType>(schema: T): Middleware => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      sendValidationError(res, result.error);
      return;
    }

    // Replace req.body with validated data (ensures type safety)
    req.body = result.data;
    next();
  };
};

/**
 * Validate route params; handlers keep reading req.params
 */
export const validateParams = <T extends ZodType>(schema: T): Middleware => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.params);
    if (!result.success) {
      sendValidationError(res, result.error);
      return;
    }
    next();
  };
};

/**
 * Validate the query string; handlers keep reading req.query
 */
export const validateQuery = <T extends ZodType>(schema: T): Middleware => {
  return (req: Request, res: Response, next: NextFunction): void => {
    const result = schema.safeParse(req.query);
    if (!result.success) {
      sendValidationError(res, result.error);
      return;
    }
    next();
  };
};
