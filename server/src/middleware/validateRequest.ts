import type { NextFunction, Request, Response } from "express";
import type { ZodError, ZodTypeAny } from "zod";

type RequestSchema = {
  body?: ZodTypeAny;
  params?: ZodTypeAny;
  query?: ZodTypeAny;
};

type FormattedError = {
  path: string;
  message: string;
};

/**
 * Parses each declared part of the request once and puts the parsed value back,
 * so handlers read trimmed and defaulted input.
 */
export function validateRequest(schema: RequestSchema) {
  return (req: Request, res: Response, next: NextFunction) => {
    const errors: FormattedError[] = [];

    if (schema.params) {
      const result = schema.params.safeParse(req.params);
      if (result.success) {
        req.params = result.data;
      } else {
        errors.push(...formatErrors(result.error));
      }
    }
    if (schema.query) {
      const result = schema.query.safeParse(req.query);
      if (result.success) {
        req.query = result.data;
      } else {
        errors.push(...formatErrors(result.error));
      }
    }
    if (schema.body) {
      const result = schema.body.safeParse(req.body ?? {});
      if (result.success) {
        req.body = result.data;
      } else {
        errors.push(...formatErrors(result.error));
      }
    }

    if (errors.length) {
      return res.status(400).json({
        message: "Validation failed.",
        errors
      });
    }
    return next();
  };
}

function formatErrors(error: ZodError): FormattedError[] {
  return error.issues.map((issue) => ({
    path: issue.path.join("."),
    message: issue.message
  }));
}
