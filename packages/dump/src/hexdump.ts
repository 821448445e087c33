export interface HexLine {
  offset: string;
  hex: string;
  text: string;
}

const WIDTH = 16;

// Sixteen bytes per line: the offset, the bytes in hex in two groups of
// eight, and the bytes as text with anything unprintable shown as a dot.
export function hexdump(data: number[]): HexLine[] {
  const lines: HexLine[] = [];
  for (let start = 0; start < data.length; start += WIDTH) {
    const chunk = data.slice(start, start + WIDTH);
    let hex = "";
    for (let i = 0; i < WIDTH; ++i) {
      hex += i < chunk.length ? chunk[i].toString(16).padStart(2, "0") : "  ";
      hex += i === WIDTH / 2 - 1 ? "  " : " ";
    }
    lines.push({
      offset: start.toString(16).padStart(8, "0"),
      hex: hex.slice(0, -1),
      text: chunk.map(byte =>
        byte >= 0x20 && byte < 0x7f ? String.fromCharCode(byte) : ".",
      ).join(""),
    });
  }
  return lines;
}
