import type { NextFunction, Request, Response } from "express";
import { HttpError, NotFoundError } from "../types/http";
import { errorHeading, errorPage, notFoundPage } from "../views/error.view";
import { sendPage } from "../views/render";

export const notFound = (_req: Request, _res: Response, next: NextFunction) => {
  next(new NotFoundError());
};

// express and its body parsers flag client errors with status or statusCode
const clientStatus = (error: unknown): number | undefined => {
  if (typeof error !== "object" || error === null) {
    return undefined;
  }
  const status =
    "status" in error
      ? error.status
      : "statusCode" in error
        ? error.statusCode
        : undefined;
  return typeof status === "number" && status >= 400 && status < 500
    ? status
    : undefined;
};

// express recognises error handlers by their four parameters
export const errorHandler = (
  error: unknown,
  _req: Request,
  res: Response,
  next: NextFunction
) => {
  if (res.headersSent) {
    next(error);
    return;
  }

  const status = error instanceof HttpError ? error.status : clientStatus(error);

  if (status === 404) {
    sendPage(res, {
      title: "Not Found",
      content: notFoundPage(
        error instanceof HttpError ? error.message : new NotFoundError().message
      ),
      status,
    });
    return;
  }

  if (status === undefined) {
    console.error("Unhandled request error:", error);
  }
  const responseStatus = status ?? 500;
  sendPage(res, {
    title: errorHeading(responseStatus),
    content: errorPage(responseStatus),
    status: responseStatus,
  });
};
