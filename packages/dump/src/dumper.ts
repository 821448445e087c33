import * as path from "path";
import { Reflector, isValue } from "@refdump/model";
import { findCaller, parseStack } from "./caller";
import { theme } from "./colors";
import type { Value } from "@refdump/model";
import { resolveConfig } from "./config";
import type { DumperConfig } from "./config";
import { AnsiFormatter, HTMLFormatter, PlainFormatter } from "./formatters";
import type { Formatter } from "./formatters";
import { Renderer } from "./renderer";

// Anything text can be written to, such as process.stdout.
export interface Writer {
  write(chunk: string): unknown;
}

export class Dumper {
  public readonly config: Readonly<DumperConfig>;

  constructor(config?: Partial<DumperConfig>) {
    this.config = Object.freeze(resolveConfig(config));
  }

  // Renders values that are already in the model.
  public render(roots: Value[], formatter: Formatter = this.textFormatter()): string {
    return new Renderer(this.config, formatter).render(roots);
  }

  public sdump(...values: unknown[]): string {
    const formatter = this.textFormatter();
    return this.header(formatter) + this.render(toRoots(values), formatter);
  }

  public fdump(writer: Writer, ...values: unknown[]) {
    writer.write(this.sdump(...values) + "\n");
  }

  public dump(...values: unknown[]) {
    this.fdump(process.stdout, ...values);
  }

  public die(...values: unknown[]): never {
    this.dump(...values);
    return process.exit(1);
  }

  public sdumpHTML(...values: unknown[]): string {
    const { htmlTagSection, htmlTagToken, useColors } = this.config;
    const formatter = new HTMLFormatter(htmlTagToken, useColors);
    return `<${htmlTagSection} class="refdump" style="background-color:black; color:white; padding:4px; border-radius: 4px">\n` +
      this.header(formatter) +
      this.render(toRoots(values), formatter) +
      `</${htmlTagSection}>`;
  }

  // "[>] sdump  ⟵  src/app.ts:12", naming the function called in this
  // package and where it was called from.
  private header(formatter: Formatter): string {
    if (!this.config.showHeader) return "";
    const { stack = "" } = new Error;
    const found = findCaller(parseStack(stack), file => path.dirname(file) === __dirname);
    if (!found) return "";
    const { entry, site } = found;
    const file = path.relative(process.cwd(), site.file) || site.file;
    return formatter.apply(theme.header, `[>] ${entry}`) +
      formatter.apply(theme.notice, `  ⟵  ${file}:${site.line}`) + "\n";
  }

  private textFormatter(): Formatter {
    return this.config.useColors ? new AnsiFormatter : new PlainFormatter;
  }
}

// Model values pass through untouched. Everything else is reflected, through
// one Reflector so that objects shared between arguments share storage.
export function toRoots(values: unknown[]): Value[] {
  const reflector = new Reflector;
  return values.map(value => isValue(value) ? value : reflector.reflect(value));
}
