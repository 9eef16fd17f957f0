import type { SafeHtml } from "../views/html";

// Values every page render needs, set once per request by createApp
declare global {
  namespace Express {
    interface Locals {
      appName: string;
    }
  }
}

export interface PageResponse {
  title: string;
  content: SafeHtml;
  status?: number;
}

export class HttpError extends Error {
  constructor(public readonly status: number, message: string) {
    super(message);
    this.name = "HttpError";
  }
}

export class NotFoundError extends HttpError {
  constructor(message = "The page you were looking for does not exist.") {
    super(404, message);
    this.name = "NotFoundError";
  }
}
