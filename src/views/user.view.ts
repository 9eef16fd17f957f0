import type { User } from "../models/user.model";
import { html } from "./html";

/** First whitespace-delimited word of the user's name, or "" without one. */
export const firstName = (user: User): string =>
  (user.name ?? "").trim().split(/\s+/)[0];

const userPath = (user: User) => `/users/${encodeURIComponent(user.id ?? "")}`;

const userLabel = (user: User) =>
  html`<b>${firstName(user)}</b> (${user.id})`;

export const userIndexPage = (users: readonly User[]) => html`<h1>Listing Users</h1>
<table>
  <tbody>
${users.map(
  (user) => html`    <tr>
      <td>${userLabel(user)}</td>
      <td><a href="${userPath(user)}">View</a></td>
    </tr>
`
)}  </tbody>
</table>`;

export const userShowPage = (user: User) => html`<h1>Showing User</h1>
<p>${userLabel(user)}</p>
<p><a href="/users">Back to users</a></p>`;
