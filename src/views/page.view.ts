import { html } from "./html";

export const homePage = (appName: string) => html`<section class="welcome">
  <h1>Welcome to ${appName}!</h1>
  <p>A small server-rendered app. Have a look at the <a href="/users">users</a>.</p>
</section>`;
