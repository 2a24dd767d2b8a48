import fs from "node:fs";
import Handlebars from "handlebars";

import type { ContextStore } from "./context-store.js";
import { TemplateError, errorMessage } from "./errors.js";
import type { Logger } from "./types.js";
import { runShellSync } from "../lib/exec.js";
import { applyPermissions, type Permissions } from "../lib/permissions.js";

export interface RenderOptions {
  /** Name used in log messages and errors, usually the template path. */
  name: string;
  /** Working directory of commands run through the `shell` helper. */
  shellDirectory: string;
}

export interface CompileTemplateOptions {
  template: string;
  target: string;
  context: ContextStore;
  shellDirectory: string;
  permissions?: Permissions;
}

interface CachedTemplate {
  mtimeMs: number;
  delegate: Handlebars.TemplateDelegate;
}

/**
 * Renders templates against a context store.
 *
 * Undefined top-level variables render as empty strings and are logged;
 * property access on an undefined value fails the whole render.
 */
export class TemplateManager {
  private readonly handlebars = Handlebars.create();
  private readonly templateCache = new Map<string, CachedTemplate>();
  private shellDirectory: string | undefined;

  constructor(
    private readonly logger: Logger,
    private readonly env: NodeJS.ProcessEnv = process.env,
  ) {
    this.registerHelper("shell", (...args: unknown[]) => {
      // The last argument is the Handlebars options object.
      const [command, timeout, fallback] = args.slice(0, -1);
      if (typeof command !== "string") return "";
      return runShellSync(command, {
        cwd: this.shellDirectory,
        timeout: typeof timeout === "number" ? timeout : 2,
        fallback: typeof fallback === "string" ? fallback : "",
        logger: this.logger,
        env: this.env,
      });
    });
  }

  /**
   * Register a helper function
   */
  registerHelper(name: string, helper: Handlebars.HelperDelegate): void {
    this.handlebars.registerHelper(name, helper);
  }

  /**
   * Register a partial template
   */
  registerPartial(name: string, content: string): void {
    this.handlebars.registerPartial(name, content);
  }

  private compile(source: string): Handlebars.TemplateDelegate {
    return this.handlebars.compile(source, { noEscape: true, assumeObjects: true });
  }

  private load(templatePath: string): Handlebars.TemplateDelegate {
    let source: string;
    let mtimeMs: number;
    try {
      mtimeMs = fs.statSync(templatePath).mtimeMs;
      const cached = this.templateCache.get(templatePath);
      if (cached && cached.mtimeMs === mtimeMs) return cached.delegate;
      source = fs.readFileSync(templatePath, "utf8");
    } catch (error) {
      throw new TemplateError(
        `Could not read template "${templatePath}": ${errorMessage(error)}`,
        templatePath,
        { cause: error },
      );
    }
    const delegate = this.compile(source);
    this.templateCache.set(templatePath, { mtimeMs, delegate });
    return delegate;
  }

  private execute(
    delegate: Handlebars.TemplateDelegate,
    context: ContextStore,
    options: RenderOptions,
  ): string {
    const view = context.templateView(
      (key) => {
        this.logger.warn({ template: options.name, variable: key }, "Undefined template variable");
      },
      { env: { ...this.env } },
    );

    const previousDirectory = this.shellDirectory;
    this.shellDirectory = options.shellDirectory;
    try {
      return delegate(view);
    } catch (error) {
      throw new TemplateError(
        `Could not render template "${options.name}": ${errorMessage(error)}`,
        options.name,
        { cause: error },
      );
    } finally {
      this.shellDirectory = previousDirectory;
    }
  }

  /**
   * Render template source held in memory.
   */
  render(source: string, context: ContextStore, options: RenderOptions): string {
    let delegate: Handlebars.TemplateDelegate;
    try {
      delegate = this.compile(source);
    } catch (error) {
      throw new TemplateError(
        `Could not parse template "${options.name}": ${errorMessage(error)}`,
        options.name,
        { cause: error },
      );
    }
    return this.execute(delegate, context, options);
  }

  renderFile(templatePath: string, context: ContextStore, shellDirectory: string): string {
    return this.execute(this.load(templatePath), context, { name: templatePath, shellDirectory });
  }

  /**
   * Render `template` into `target` and apply permissions. The target's
   * parent directory must exist.
   */
  compileTemplate(options: CompileTemplateOptions): void {
    this.logger.info(
      { template: options.template, target: options.target },
      `[Compiling] Template: "${options.template}" -> Target: "${options.target}"`,
    );
    const result = this.renderFile(options.template, options.context, options.shellDirectory);
    fs.writeFileSync(options.target, result);
    applyPermissions(options.target, options.template, options.permissions);
  }
}
