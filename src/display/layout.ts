export const MATRIX_LAYOUTS = ['row-major', 'serpentine-rows', 'serpentine-columns'] as const;

export type MatrixLayout = (typeof MATRIX_LAYOUTS)[number];

/** Strip index of matrix cell (x, y), or null when outside the matrix. */
export function mapXyToPixel(
  x: number,
  y: number,
  width: number,
  height: number,
  layout: MatrixLayout
): number | null {
  if (x < 0 || y < 0 || x >= width || y >= height) {
    return null;
  }
  switch (layout) {
    case 'row-major':
      return y * width + x;
    case 'serpentine-rows':
      return y * width + (y % 2 === 0 ? x : width - 1 - x);
    case 'serpentine-columns':
      return x * height + (x % 2 === 0 ? y : height - 1 - y);
  }
}
