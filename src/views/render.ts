import type { Response } from "express";
import type { PageResponse } from "../types/http";
import { renderLayout } from "./layout";

export const sendPage = (
  res: Response,
  { title, content, status = 200 }: PageResponse
) =>
  res
    .status(status)
    .type("html")
    .send(
      renderLayout({ title, appName: res.locals.appName, content }).content
    );
