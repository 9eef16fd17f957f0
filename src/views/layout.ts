import { html, type SafeHtml } from "./html";

export interface LayoutAssigns {
  title: string;
  appName: string;
  content: SafeHtml;
}

// Every page is nested in this document
export const renderLayout = ({ title, appName, content }: LayoutAssigns) =>
  html`<!DOCTYPE html>
<html lang="en">
  <head>
    <meta charset="utf-8" />
    <meta name="viewport" content="width=device-width, initial-scale=1" />
    <title>${title} · ${appName}</title>
  </head>
  <body>
    <header>
      <a href="/">${appName}</a>
      <nav><a href="/users">Users</a></nav>
    </header>
    <main role="main">
${content}
    </main>
  </body>
</html>
`;
