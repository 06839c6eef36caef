// Tiny tagged-template renderer: interpolations are escaped unless already SafeHtml.
export class SafeHtml {
  constructor(readonly value: string) {}

  toString() {
    return this.value;
  }
}

const ESCAPES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  '"': "&quot;",
  "'": "&#39;",
};

export function escapeHtml(s: string) {
  return s.replace(/[&<>"']/g, (c) => ESCAPES[c] ?? c);
}

type Renderable = SafeHtml | string | number | boolean | null | undefined | Renderable[];

function render(v: Renderable): string {
  if (v instanceof SafeHtml) return v.value;
  if (Array.isArray(v)) return v.map(render).join("");
  if (v === null || v === undefined || v === false) return "";
  return escapeHtml(String(v));
}

export function html(strings: TemplateStringsArray, ...values: Renderable[]) {
  let out = strings[0];
  values.forEach((v, i) => {
    out += render(v) + strings[i + 1];
  });
  return new SafeHtml(out);
}

export const EMPTY = new SafeHtml("");
