/**
 * Markup that has already been escaped (or is trusted) and is written
 * into templates as is.
 */
export class SafeHtml {
  constructor(public readonly content: string) {}

  toString(): string {
    return this.content;
  }
}

const ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export const escape = (value: unknown): string => {
  if (value instanceof SafeHtml) {
    return value.content;
  }
  if (Array.isArray(value)) {
    return value.map(escape).join("");
  }
  return String(value ?? "").replace(/[&<>"']/g, (char) => ENTITIES[char]);
};

export const raw = (content: string) => new SafeHtml(content);

/**
 * Tagged template for views. Interpolated values are escaped unless they
 * are SafeHtml; arrays are rendered item by item with no separator.
 *
 * @example
 * html`<b>${"<i>"}</b>`.content === "<b>&lt;i&gt;</b>"
 */
export const html = (
  strings: TemplateStringsArray,
  ...values: unknown[]
): SafeHtml => {
  let result = strings[0];
  values.forEach((value, index) => {
    result += escape(value) + strings[index + 1];
  });
  return new SafeHtml(result);
};
