import { STATUS_CODES } from "http";
import { html } from "./html";

export const notFoundPage = (message: string) => html`<h1>Not Found</h1>
<p>${message}</p>
<p><a href="/">Back home</a></p>`;

export const errorHeading = (status: number) =>
  STATUS_CODES[status] ?? "Error";

export const errorPage = (status = 500) => html`<h1>${errorHeading(status)}</h1>
<p>${
  status < 500
    ? "The request could not be processed."
    : "Something went wrong on our side."
}</p>`;
