import { entries, literal, rootOccurrence } from "@refdump/model";
import type { Value } from "@refdump/model";
import type { KeyDeriver } from "./keys";

// Serializes a value for grouping likely copies together. Everything stored
// inline is spelled out, while anything reached through a pointer or a
// function is written as the location it refers to, so two values match
// exactly when they hold equal data and point at the same things.
//
// Primitives print as bare literals without their type, so an int 1 and a
// uint8 1 land in the same group.
export function fingerprint(value: Value, keys: KeyDeriver): string {
  return new Fingerprinter(keys).print(value);
}

interface Frame {
  value: Value;
  storage: object;
  items: Value[];
  texts: string[];
  close(texts: string[]): string;
  // Set when the text depends on which storage is being printed further up.
  open: boolean;
}

// Prints with an explicit stack, so nesting depth is not limited by the call
// stack. Composites nested inside the value being printed are written as
// `#<id>` tokens interned by their own text, and remembered per node, so a
// long chain of nested values costs time in proportion to its length.
// Tokens are only comparable between prints of the same Fingerprinter.
export class Fingerprinter {
  private ids = new Map<string, number>();
  private memo = new Map<Value, string>();
  private path = new Set<object>();

  constructor(private keys: KeyDeriver) {}

  public print(value: Value): string {
    const stack: Frame[] = [];
    const leaf = this.enter(value, stack);
    if (leaf !== undefined) return leaf;

    for (;;) {
      const frame = stack[stack.length - 1];
      if (frame.texts.length < frame.items.length) {
        const text = this.enter(frame.items[frame.texts.length], stack);
        if (text !== undefined) frame.texts.push(text);
        continue;
      }

      stack.pop();
      this.path.delete(frame.storage);
      const text = frame.close(frame.texts);
      const token = `#${this.intern(text)}`;
      if (!frame.open) this.memo.set(frame.value, token);
      if (stack.length === 0) return text;
      stack[stack.length - 1].texts.push(token);
    }
  }

  private intern(text: string): number {
    let id = this.ids.get(text);
    if (id === undefined) {
      this.ids.set(text, id = this.ids.size + 1);
    }
    return id;
  }

  // Returns the text of a value that needs no frame of its own, or pushes a
  // frame for it and returns undefined.
  private enter(value: Value, stack: Frame[]): string | undefined {
    let current = value;
    while (current.kind === "interface") {
      if (!current.elem) return `${current.type}(nil)`;
      current = current.elem;
    }

    switch (current.kind) {
      case "primitive":
        return literal(current.value);

      case "pointer":
        return current.target
          ? `(${current.type})(@${this.keys.location(current.target)})`
          : `(${current.type})(nil)`;

      case "func":
        return current.handle
          ? `(${current.type})(@${this.keys.location(current.handle)})`
          : `(${current.type})(nil)`;
    }

    const storage = storageOf(current);
    if (!storage) return `${current.type}(nil)`;

    // Storage already being printed further up is written as a location,
    // which keeps self-containing slices and maps finite.
    if (this.path.has(storage)) {
      const index = stack.findIndex(above => above.storage === storage);
      for (let i = index; i < stack.length; ++i) stack[i].open = true;
      return `${current.type}(@${this.keys.location(storage)})`;
    }

    if (stack.length > 0) {
      const token = this.memo.get(current);
      if (token !== undefined) return token;
    }

    this.path.add(storage);
    stack.push(this.frame(current, storage));
    return undefined;
  }

  private frame(value: Value, storage: object): Frame {
    const { type } = value;
    const braces = (parts: string[]) => `${type}{${parts.join(", ")}}`;
    const frame = (items: Value[], close: (texts: string[]) => string): Frame =>
      ({ value, storage, items, texts: [], close, open: false });

    switch (value.kind) {
      case "struct": {
        const names = value.fields.map(field => field.name);
        return frame(value.fields.map(field => field.value),
          texts => braces(texts.map((text, i) => `${names[i]}:${text}`)));
      }

      case "map": {
        const items: Value[] = [];
        entries(rootOccurrence(value)).forEach(([key, item]) => {
          items.push(key.value, item.value);
        });
        return frame(items, texts => {
          const parts: string[] = [];
          for (let i = 0; i < texts.length; i += 2) {
            parts.push(`${texts[i]}:${texts[i + 1]}`);
          }
          return braces(parts);
        });
      }

      case "array":
      case "slice":
        return frame(value.elements || [], braces);
    }

    return frame([], braces);
  }
}

// Struct and array values are their own storage, while slices and maps
// share theirs between copies. Nil slices and maps have none.
function storageOf(value: Value): object | null {
  switch (value.kind) {
    case "struct":
    case "array":
      return value;
    case "slice":
      return value.elements;
    case "map":
      return value.entries;
  }
  return null;
}
