import type { Request, Response } from "express";
import { homePage } from "../views/page.view";
import { sendPage } from "../views/render";

export const home = (_req: Request, res: Response) => {
  sendPage(res, { title: "Welcome", content: homePage(res.locals.appName) });
};
