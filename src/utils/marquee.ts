// East Asian wide and fullwidth ranges occupy two terminal cells.
const WIDE =
  /[\u1100-\u115F\u2E80-\u303E\u3041-\u33FF\u3400-\u4DBF\u4E00-\u9FFF\uA000-\uA4CF\uAC00-\uD7A3\uF900-\uFAFF\uFE30-\uFE4F\uFF00-\uFF60\uFFE0-\uFFE6]/;

const CONTINUATION = "";

export function cellWidth(char: string): number {
  return WIDE.test(char) ? 2 : 1;
}

export function textWidth(text: string): number {
  let width = 0;
  for (const char of text) width += cellWidth(char);
  return width;
}

function toCells(text: string): string[] {
  const cells: string[] = [];
  for (const char of text) {
    cells.push(char);
    if (cellWidth(char) === 2) cells.push(CONTINUATION);
  }
  return cells;
}

/**
 * Visible window of a right-to-left marquee. At offset 0 the text sits just beyond the right edge;
 * at `width + textWidth(text)` it has fully left on the left.
 */
export function marqueeWindow(text: string, offset: number, width: number): string {
  const cells = [...new Array<string>(width).fill(" "), ...toCells(text)];
  const visible = cells.slice(offset, offset + width);
  while (visible.length < width) visible.push(" ");

  if (visible[0] === CONTINUATION) visible[0] = " ";
  const last = visible.length - 1;
  const lastChar = visible[last];
  if (lastChar !== undefined && lastChar !== CONTINUATION && cellWidth(lastChar) === 2) visible[last] = " ";

  return visible.join("");
}
