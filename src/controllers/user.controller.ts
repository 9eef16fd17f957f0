import type { Request, Response } from "express";
import { getUser, listUsers } from "../services/accounts";
import { NotFoundError } from "../types/http";
import { firstName, userIndexPage, userShowPage } from "../views/user.view";
import { sendPage } from "../views/render";

export const index = (_req: Request, res: Response) => {
  sendPage(res, { title: "Users", content: userIndexPage(listUsers()) });
};

// Errors thrown here reach the error handler; express 4 catches sync throws
export const show = (req: Request<{ id: string }>, res: Response) => {
  const user = getUser(req.params.id);
  if (!user) {
    throw new NotFoundError(`No user with id ${req.params.id}.`);
  }
  sendPage(res, { title: firstName(user), content: userShowPage(user) });
};
