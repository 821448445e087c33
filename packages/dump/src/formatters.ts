import { RESET } from "./colors";
import type { Color } from "./colors";

export interface Formatter {
  apply(color: Color, text: string): string;
}

export class PlainFormatter implements Formatter {
  public apply(_color: Color, text: string): string {
    return text;
  }
}

export class AnsiFormatter implements Formatter {
  public apply(color: Color, text: string): string {
    return color.ansi + text + RESET;
  }
}

// Without colors every token is still wrapped, in a neutral light color, so
// the markup has the same shape either way.
export class HTMLFormatter implements Formatter {
  constructor(
    private tag = "span",
    private useColors = true,
  ) {}

  public apply(color: Color, text: string): string {
    const hex = this.useColors ? color.html : "#fefefe";
    return `<${this.tag} style="color:${hex}">${escapeHTML(text)}</${this.tag}>`;
  }
}

const HTML_ENTITIES: Record<string, string> = {
  "&": "&amp;",
  "<": "&lt;",
  ">": "&gt;",
  "\"": "&#34;",
  "'": "&#39;",
};

export function escapeHTML(text: string): string {
  return text.replace(/[&<>"']/g, char => HTML_ENTITIES[char]);
}
