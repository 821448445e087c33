export interface CallSite {
  // Empty for anonymous functions and top-level code.
  name: string;
  file: string;
  line: number;
}

// "    at name (file:line:column)" or "    at file:line:column"
const FRAME = /^\s*at (?:(.+?) \()?(.+?):(\d+):\d+\)?$/;

export function parseStack(stack: string): CallSite[] {
  const sites: CallSite[] = [];
  stack.split("\n").forEach(text => {
    const match = FRAME.exec(text);
    if (!match) return;
    const [, name = "", file, line] = match;
    sites.push({ name, file, line: Number(line) });
  });
  return sites;
}

// The first frame outside this package, together with the name of the last
// frame inside it, which is the function the caller called.
export function findCaller(
  sites: CallSite[],
  isInternal: (file: string) => boolean,
): { entry: string; site: CallSite } | undefined {
  let entry = "";
  for (let i = 0; i < sites.length; ++i) {
    if (!isInternal(sites[i].file)) {
      return { entry, site: sites[i] };
    }
    entry = sites[i].name;
  }
  return undefined;
}
