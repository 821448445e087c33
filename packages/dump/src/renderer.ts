import {
  elem,
  elements,
  entries,
  fields,
  isNil,
  literal,
  rootOccurrence,
} from "@refdump/model";
import type { Occurrence, Primitive, TextForm, Value } from "@refdump/model";
import { ReferenceSession } from "@refdump/refs";
import { theme } from "./colors";
import type { Color } from "./colors";
import type { DumperConfig } from "./config";
import type { Formatter } from "./formatters";
import { hexdump } from "./hexdump";

const FIELD_MARKER = "⯀ ";
const HIDDEN_FIELD_MARKER = "🞏 ";
const BACKREF_MARKER = "↩︎ ";
const INTERFACE_MARKER = "⧉ ";
const METHOD_MARKER = "⦿ ";

// Collections with more members than this never go on one line.
const MAX_INLINE_MEMBERS = 10;

const ESCAPES: Record<string, string> = {
  "\n": "\\n",
  "\t": "\\t",
  "\r": "\\r",
  "\v": "\\v",
  "\f": "\\f",
  "\x1b": "\\x1b",
};

function runes(text: string): number {
  return Array.from(text).length;
}

function padRight(text: string, width: number, target: number): string {
  return width >= target ? text : text + " ".repeat(target - width);
}

function isSimple(value: Value): boolean {
  return value.kind === "primitive";
}

function isByte(value: Value): boolean {
  return value.kind === "primitive" &&
    (value.type === "uint8" || value.type === "byte") &&
    typeof value.value === "number";
}

interface MapKey {
  text: string;
  // Unset for keys rendered as values, which are not aligned.
  width?: number;
}

// Renders one top-level call. A renderer holds the reference session and the
// cycle guard for that call, so it is used once and thrown away.
export class Renderer {
  private session: ReferenceSession | undefined;
  // Storage of the pointers, slices and maps being expanded, when references
  // are not tracked.
  private path = new Set<object>();

  constructor(
    private config: DumperConfig,
    private formatter: Formatter,
  ) {}

  public render(roots: Value[]): string {
    let occurrences: Occurrence[];
    if (this.config.trackReferences) {
      this.session = new ReferenceSession;
      occurrences = this.session.analyze(roots);
    } else {
      occurrences = roots.map(rootOccurrence);
    }

    let out = "";
    occurrences.forEach((root, i) => {
      if (i > 0) out += "\n";
      if (this.config.showTypes) {
        out += this.paint(theme.type, this.typeName(root.value, false)) + " => ";
      }
      out += this.value(root, 0, false) + "\n";
    });
    return out;
  }

  private paint(color: Color, text: string): string {
    return this.formatter.apply(color, text);
  }

  private indent(level: number, text = ""): string {
    return " ".repeat(level * this.config.indentWidth) + text;
  }

  private metaHint(text: string): string {
    return this.paint(theme.meta, `|${text}| `);
  }

  // Inside a collection, the types of scalar members are left out, since the
  // collection's own type already says what they are.
  private typeName(value: Value, inCollection: boolean): string {
    if (!this.config.showTypes) return "";
    switch (value.kind) {
      case "interface":
        return INTERFACE_MARKER + value.type +
          (value.elem ? `(${value.elem.type})` : "");
      case "struct":
      case "array":
      case "slice":
      case "map":
        return value.type;
    }
    return inCollection ? "" : value.type;
  }

  private value(occurrence: Occurrence, level: number, skipRefCheck: boolean): string {
    if (level > this.config.maxDepth) {
      return this.paint(theme.notice, "… (max depth reached)");
    }
    const { value } = occurrence;
    if (isNil(value)) {
      return this.paint(theme.nil, "<nil>");
    }

    let prefix = "";
    if (this.session && !skipRefCheck) {
      const resolution = this.session.resolve(occurrence);
      if (resolution.kind === "backref") {
        return this.paint(theme.backref, BACKREF_MARKER + resolution.label);
      }
      if (resolution.kind === "definition") {
        prefix = this.paint(theme.id, resolution.label + " ");
      }
    }

    if (!this.session) {
      const storage = storageOf(value);
      if (storage) {
        if (this.path.has(storage)) {
          return this.paint(theme.notice, "<cycle>");
        }
        this.path.add(storage);
        const body = this.body(occurrence, level);
        this.path.delete(storage);
        return prefix + body;
      }
    }

    return prefix + this.body(occurrence, level);
  }

  private body(occurrence: Occurrence, level: number): string {
    const { value } = occurrence;
    switch (value.kind) {
      case "pointer":
      case "interface": {
        const inner = elem(occurrence);
        return inner
          ? this.value(inner, level, true)
          : this.paint(theme.nil, "<nil>");
      }
      case "struct":
        return value.textForm && !this.config.ignoreStringer
          ? this.textForm(value.textForm)
          : this.struct(occurrence, level);
      case "array":
      case "slice":
        return this.list(occurrence, level);
      case "map":
        return this.map(occurrence, level);
      case "func":
        return this.paint(theme.func, value.name);
      case "primitive":
        return this.primitive(value);
    }
  }

  private primitive(value: Primitive): string {
    const data = value.value;
    switch (typeof data) {
      case "string":
        return this.string(data);
      case "boolean":
        return data
          ? this.paint(theme.true, "true")
          : this.paint(theme.false, "false");
      case "number":
      case "bigint":
        return this.paint(theme.number, literal(data));
    }
    return this.paint(theme.other, literal(data));
  }

  private string(text: string): string {
    const quote = this.paint(theme.quote, "\"");
    const body = quote + this.paint(theme.string, this.escape(text)) + quote;
    return this.config.showMetaInformation
      ? this.metaHint(`R:${runes(text)}`) + body
      : body;
  }

  private textForm(form: TextForm): string {
    const isError = form.source === "error";
    const quote = this.paint(theme.quote, "\"");
    const body = quote +
      this.paint(isError ? theme.error : theme.string, this.escape(form.text)) +
      quote;
    return this.config.showMetaInformation
      ? this.metaHint(isError ? "as error" : "as Stringer") + body
      : body;
  }

  private escape(text: string): string {
    const chars = Array.from(text);
    if (chars.length > this.config.maxStringLen) {
      text = chars.slice(0, this.config.maxStringLen).join("") + "…";
    }
    return text.replace(/[\n\t\r\v\f\x1b]/g, char => ESCAPES[char]);
  }

  private struct(occurrence: Occurrence, level: number): string {
    const { value } = occurrence;
    const members = fields(occurrence);
    const methods = value.kind === "struct" && value.methods && this.config.embedTypeMethods
      ? value.methods
      : [];

    if (methods.length === 0 && this.inline(value)) {
      return "{" + members.map(([field, child]) => {
        const type = this.typeName(field.value, false);
        const label = this.fieldMarker(field.hidden) + this.paint(theme.fieldName, field.name);
        return label + (type ? " " + this.paint(theme.type, type) : "") + " => " +
          this.value(child, level, false);
      }).join(", ") + "}";
    }

    let maxKeyLen = 0;
    let maxTypeLen = 0;
    members.forEach(([field]) => {
      maxKeyLen = Math.max(maxKeyLen, runes(field.name));
      maxTypeLen = Math.max(maxTypeLen, runes(this.typeName(field.value, false)));
    });
    methods.forEach(name => {
      maxKeyLen = Math.max(maxKeyLen, runes(name));
    });
    maxKeyLen += 2;

    let out = "{\n";
    members.forEach(([field, child]) => {
      const marker = field.hidden ? HIDDEN_FIELD_MARKER : FIELD_MARKER;
      const type = this.typeName(field.value, false);
      let line = padRight(
        this.fieldMarker(field.hidden) + this.paint(theme.fieldName, field.name),
        runes(marker + field.name),
        maxKeyLen,
      );
      if (type) {
        line += "  " + padRight(this.paint(theme.type, type), runes(type), maxTypeLen);
      }
      out += this.indent(level + 1, line + " => ") +
        this.value(child, level + 1, false) + "\n";
    });
    methods.forEach(name => {
      out += this.indent(level + 1,
        this.paint(theme.methodMarker, METHOD_MARKER) + this.paint(theme.method, name)) + "\n";
    });
    return out + this.indent(level) + "}";
  }

  private fieldMarker(hidden?: boolean): string {
    return this.paint(theme.fieldMarker, hidden ? HIDDEN_FIELD_MARKER : FIELD_MARKER);
  }

  private list(occurrence: Occurrence, level: number): string {
    const items = elements(occurrence);
    const { maxItems } = this.config;
    let out = this.config.showMetaInformation ? this.metaHint(String(items.length)) : "";

    if (this.inline(occurrence.value)) {
      const parts: string[] = [];
      for (let i = 0; i < items.length; ++i) {
        if (i >= maxItems) {
          parts.push(this.paint(theme.notice, "… (truncated)"));
          break;
        }
        const type = this.typeName(items[i].value, true);
        parts.push(
          this.paint(theme.index, String(i)) +
          (type ? " " + this.paint(theme.type, type) : "") + " => " +
          this.value(items[i], level, false),
        );
      }
      return out + "[" + parts.join(", ") + "]";
    }

    if (this.config.showHexdump && items.length > 0 &&
        items.every(item => isByte(item.value))) {
      const data: number[] = [];
      items.forEach(({ value }) => {
        if (value.kind === "primitive" && typeof value.value === "number") {
          data.push(value.value);
        }
      });
      out += "[\n";
      hexdump(data).forEach(line => {
        out += this.indent(level + 1,
          this.paint(theme.hexOffset, line.offset) + "  " +
          this.paint(theme.hexBytes, line.hex) + "  " +
          this.paint(theme.hexText, `|${line.text}|`)) + "\n";
      });
      return out + this.indent(level) + "]";
    }

    let maxTypeLen = 0;
    items.slice(0, maxItems).forEach(item => {
      maxTypeLen = Math.max(maxTypeLen, runes(this.typeName(item.value, true)));
    });

    out += "[\n";
    for (let i = 0; i < items.length; ++i) {
      if (i >= maxItems) {
        out += this.indent(level + 1, this.paint(theme.notice, "… (truncated)")) + "\n";
        break;
      }
      const type = this.typeName(items[i].value, true);
      const index = this.paint(theme.index, String(i));
      const label = type
        ? `${index} ${padRight(this.paint(theme.type, type), runes(type), maxTypeLen)} => `
        : `${index} => `;
      out += this.indent(level + 1, label) + this.value(items[i], level + 1, false) + "\n";
    }
    return out + this.indent(level) + "]";
  }

  private map(occurrence: Occurrence, level: number): string {
    const pairs = entries(occurrence);
    const { maxItems } = this.config;
    let out = this.config.showMetaInformation ? this.metaHint(String(pairs.length)) : "";
    const shown = pairs.slice(0, maxItems);
    const truncated = this.paint(theme.notice, "… (truncated)");

    // Keys come first, so a value first seen as a key is labelled there.
    const keys = shown.map(([key]) => this.mapKey(key, level));

    if (this.inline(occurrence.value)) {
      const parts = shown.map(([, item], i) => {
        const type = this.typeName(item.value, true);
        return keys[i].text + (type ? " " + this.paint(theme.type, type) : "") +
          " => " + this.value(item, level, false);
      });
      if (pairs.length > maxItems) parts.push(truncated);
      return out + "[" + parts.join(", ") + "]";
    }

    let maxKeyLen = 0;
    let maxTypeLen = 0;
    shown.forEach(([, item], i) => {
      maxKeyLen = Math.max(maxKeyLen, keys[i].width || 0);
      maxTypeLen = Math.max(maxTypeLen, runes(this.typeName(item.value, true)));
    });

    out += "[\n";
    shown.forEach(([, item], i) => {
      const { text, width } = keys[i];
      const type = this.typeName(item.value, true);
      const label = type
        ? (width === undefined ? text : padRight(text, width, maxKeyLen)) + "  " +
          padRight(this.paint(theme.type, type), runes(type), maxTypeLen) + " => "
        : text + " => ";
      out += this.indent(level + 1, label) + this.value(item, level + 1, false) + "\n";
    });
    if (pairs.length > maxItems) {
      out += this.indent(level + 1, truncated) + "\n";
    }
    return out + this.indent(level) + "]";
  }

  // Scalar keys print as plain text, labelled where they are a value's
  // definition. Any other key is rendered like a value.
  private mapKey(key: Occurrence, level: number): MapKey {
    const scalar = keyText(key.value);
    if (scalar === undefined) {
      return { text: this.value(key, level + 1, false) };
    }
    let label = "";
    if (this.session) {
      const resolution = this.session.resolve(key);
      if (resolution.kind === "definition") label = resolution.label + " ";
    }
    return {
      text: (label ? this.paint(theme.id, label) : "") + this.paint(theme.index, scalar),
      width: runes(label + scalar),
    };
  }

  // Collections and structs go on one line when they hold only scalars, not
  // too many of them, and would fit in maxInlineLength.
  private inline(value: Value): boolean {
    const members: Value[] = [];
    let count: number;
    switch (value.kind) {
      case "struct":
        value.fields.forEach(field => members.push(field.value));
        count = members.length;
        break;
      case "array":
      case "slice":
        members.push(...(value.elements || []));
        count = members.length;
        break;
      case "map": {
        const table = value.entries || [];
        table.forEach(pair => members.push(pair.key, pair.value));
        count = table.length;
        break;
      }
      default:
        return true;
    }
    return count <= MAX_INLINE_MEMBERS &&
      members.every(isSimple) &&
      this.estimate(value) <= this.config.maxInlineLength;
  }

  // Approximate width of a value rendered on one line, without colors.
  private estimate(value: Value): number {
    const meta = this.config.showMetaInformation;
    switch (value.kind) {
      case "primitive": {
        const data = value.value;
        if (typeof data !== "string") return literal(data).length;
        const count = runes(data);
        return count + 2 + (meta ? ` |R:${count}|`.length : 0);
      }
      case "array":
      case "slice": {
        const items = value.elements || [];
        let length = 2 + (meta ? `|${items.length}| `.length : 0);
        items.forEach((item, i) => {
          if (i > 0) length += 2;
          length += 1 + 4 + this.estimate(item);
        });
        return length;
      }
      case "map": {
        const pairs = value.entries || [];
        let length = 2 + (meta ? `|${pairs.length}| `.length : 0);
        pairs.forEach((pair, i) => {
          if (i > 0) length += 2;
          length += this.estimate(pair.key) + 4 + this.estimate(pair.value);
          if (this.config.showTypes) length += pair.value.type.length + 1;
        });
        return length;
      }
      case "struct": {
        let length = 2;
        value.fields.forEach((field, i) => {
          if (i > 0) length += 2;
          length += 2 + field.name.length + 4 + this.estimate(field.value);
          if (this.config.showTypes) length += field.value.type.length + 1;
        });
        return length;
      }
    }
    return 10;
  }
}

// Text of a scalar map key: strings quoted, other primitives bare. Keys
// that are not scalars have none.
function keyText(value: Value): string | undefined {
  let current = value;
  while (current.kind === "interface") {
    if (!current.elem) return "<nil>";
    current = current.elem;
  }
  if (current.kind !== "primitive") return undefined;
  return typeof current.value === "string"
    ? JSON.stringify(current.value)
    : literal(current.value);
}

// What a cycle would have to pass through again.
function storageOf(value: Value): object | null {
  switch (value.kind) {
    case "pointer": return value.target;
    case "slice": return value.elements;
    case "map": return value.entries;
  }
  return null;
}
