import path from "node:path";
import Mustache from "mustache";
import type { FileSystem } from "@hostform/convergence";

type Spans = ReturnType<typeof Mustache.parse>;
type MustacheContext = InstanceType<typeof Mustache.Context>;

export interface TemplateLocation {
  file: string;
  line: number;
  column: number;
  /** The template line containing the error. */
  source: string;
}

export class TemplateRenderError extends Error {
  constructor(
    message: string,
    readonly location: TemplateLocation
  ) {
    super(message);
    this.name = "TemplateRenderError";
  }
}

export type TemplateView = Record<string, unknown>;

function locate(file: string, template: string, offset: number): TemplateLocation {
  const before = template.slice(0, offset);
  const lineStart = before.lastIndexOf("\n") + 1;
  const lineEnd = template.indexOf("\n", offset);
  return {
    file,
    line: before.split("\n").length,
    column: offset - lineStart + 1,
    source: template.slice(lineStart, lineEnd === -1 ? undefined : lineEnd)
  };
}

function isEmpty(value: unknown): boolean {
  return !value || (Array.isArray(value) && value.length === 0);
}

/**
 * Walks the parsed template the way Mustache renders it and rejects any
 * variable or section name that resolves to nothing.
 */
function checkSpans(
  spans: Spans,
  context: MustacheContext,
  file: string,
  template: string
): void {
  for (const span of spans) {
    const [type, name, start] = span;
    if (type !== "name" && type !== "&" && type !== "#" && type !== "^") {
      continue;
    }

    const value: unknown = context.lookup(name);
    if (value === undefined) {
      throw new TemplateRenderError(
        `Error rendering '${file}': '${name}' is undefined`,
        locate(file, template, start)
      );
    }
    if (span.length !== 6) {
      continue;
    }

    const children = span[4];
    if (type === "^") {
      if (isEmpty(value)) {
        checkSpans(children, context, file, template);
      }
    } else if (Array.isArray(value)) {
      for (const item of value) {
        checkSpans(children, context.push(item), file, template);
      }
    } else if (typeof value === "function" || isEmpty(value)) {
      continue;
    } else if (typeof value === "object" || typeof value === "string" || typeof value === "number") {
      checkSpans(children, context.push(value), file, template);
    } else {
      checkSpans(children, context, file, template);
    }
  }
}

/**
 * Render a Mustache template with HTML escaping disabled. Names that do not
 * resolve are errors carrying the template location.
 */
export function renderTemplate(template: string, view: TemplateView, file = "<template>"): string {
  let spans: Spans;
  try {
    spans = Mustache.parse(template);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    const match = /at (\d+)/.exec(message);
    const offset = match?.[1] === undefined ? 0 : Number(match[1]);
    throw new TemplateRenderError(
      `Error rendering '${file}': ${message}`,
      locate(file, template, offset)
    );
  }
  checkSpans(spans, new Mustache.Context(view), file, template);

  const originalEscape = Mustache.escape;
  Mustache.escape = (value: string) => value;
  try {
    return Mustache.render(template, view);
  } finally {
    Mustache.escape = originalEscape;
  }
}

export interface RoleTemplates {
  /** Render a template file relative to the role directory. */
  renderFile(relativePath: string, extraVars?: Record<string, unknown>): Promise<string>;
}

export function createRoleTemplates(options: {
  fs: FileSystem;
  roleDir: string;
  view: TemplateView;
}): RoleTemplates {
  return {
    async renderFile(relativePath, extraVars) {
      const template = await options.fs.readFile(
        path.join(options.roleDir, relativePath),
        "utf8"
      );
      const view = extraVars ? withExtraVars(options.view, extraVars) : options.view;
      return renderTemplate(template, view, relativePath);
    }
  };
}

function withExtraVars(view: TemplateView, extraVars: Record<string, unknown>): TemplateView {
  const vars = view.vars;
  const base = typeof vars === "object" && vars !== null ? vars : {};
  return { ...view, vars: { ...base, ...extraVars } };
}
