import fontData from '../../config/font-5x7.json' with { type: 'json' };

export interface BitmapFont {
  /** Columns per glyph. */
  width: number;
  /** Rows per glyph; bit y of a column is row y, counted from the top. */
  height: number;
  /** Blank columns between glyphs. */
  spacing: number;
  glyphs: Readonly<Record<string, readonly number[]>>;
}

export const DEFAULT_FONT: BitmapFont = fontData;

/** Column bitmasks for a string; characters without a glyph render blank. */
export function textColumns(text: string, font: BitmapFont = DEFAULT_FONT): number[] {
  const blank: number[] = new Array<number>(font.width).fill(0);
  const gap: number[] = new Array<number>(font.spacing).fill(0);
  const columns: number[] = [];
  [...text.toUpperCase()].forEach((char, index) => {
    if (index > 0) {
      columns.push(...gap);
    }
    columns.push(...(font.glyphs[char] ?? blank));
  });
  return columns;
}
