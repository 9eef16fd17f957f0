import type { NextFunction, Request, Response } from "express";

// One line per finished response: "GET /users 200 1.2ms"
export const requestLogger = (
  req: Request,
  res: Response,
  next: NextFunction
) => {
  const startedAt = process.hrtime.bigint();
  res.on("finish", () => {
    const elapsedMs = Number(process.hrtime.bigint() - startedAt) / 1e6;
    console.log(
      `${req.method} ${req.originalUrl} ${res.statusCode} ${elapsedMs.toFixed(1)}ms`
    );
  });
  next();
};
