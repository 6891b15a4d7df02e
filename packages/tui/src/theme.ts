const SGR = {
  bold: 1,
  dim: 2,
  inverse: 7,
  red: 31,
  green: 32,
  yellow: 33,
  cyan: 36,
  gray: 90,
} as const;

export type StyleName = keyof typeof SGR;

export const THEME = {
  title: ["bold", "cyan"],
  border: [],
  borderActive: ["bold", "cyan"],
  highlighted: ["bold", "yellow"],
  selected: ["inverse", "yellow"],
  muted: ["gray"],
  hint: ["cyan"],
  label: ["bold"],
  danger: ["bold", "red"],
  error: ["bold", "red"],
  editing: ["green"],
} as const satisfies Record<string, readonly StyleName[]>;

export type Theme = typeof THEME;

/**
 * Wrap text in ANSI SGR codes.
 */
export function paint(text: string, styles: readonly StyleName[]): string {
  if (styles.length === 0 || text === "") return text;
  return `\x1b[${styles.map((s) => SGR[s]).join(";")}m${text}\x1b[0m`;
}
