import { OFF, type PixelStrip } from '../hardware/pixelStrip.js';
import type { DisplayDirectives, MatrixText, Rgb } from '../types.js';
import { createLogger, type Logger } from '../utils/telemetry.js';
import type { DisplayTarget } from './display.js';
import { DEFAULT_FONT, textColumns, type BitmapFont } from './font.js';
import { mapXyToPixel, type MatrixLayout } from './layout.js';

export interface MatrixDriverOptions {
  /** When false nothing is ever written; the matrix stays blank. */
  enabled: boolean;
  /** 0.0–1.0, applied to every channel. */
  brightness: number;
  layout: MatrixLayout;
  font?: BitmapFont;
  logger?: Logger;
}

export function scaleColor(color: Rgb, brightness: number): Rgb {
  return [
    Math.round(color[0] * brightness),
    Math.round(color[1] * brightness),
    Math.round(color[2] * brightness)
  ];
}

function describe(matrix: MatrixText | null): string {
  if (!matrix) {
    return 'blank';
  }
  return `${matrix.text}@${matrix.column}:${matrix.colors.map((color) => color.join(',')).join(';')}`;
}

export class MatrixDriver implements DisplayTarget {
  readonly name = 'matrix';
  private readonly font: BitmapFont;
  private readonly logger: Logger;
  private rendered: string | null = null;

  constructor(
    private readonly strip: PixelStrip | null,
    private readonly options: MatrixDriverOptions
  ) {
    this.font = options.font ?? DEFAULT_FONT;
    this.logger = options.logger ?? createLogger('matrix');
    if (options.enabled && !strip) {
      throw new Error('An enabled matrix needs a pixel strip');
    }
    if (!options.enabled) {
      this.logger.info('Matrix display disabled');
    }
  }

  async apply(directives: DisplayDirectives): Promise<void> {
    if (!this.options.enabled || !this.strip) {
      return;
    }
    const key = describe(directives.matrix);
    if (key === this.rendered) {
      this.logger.debug({ matrix: directives.matrix?.text ?? null }, 'Matrix unchanged');
      return;
    }
    this.strip.fill(OFF);
    if (directives.matrix) {
      this.draw(this.strip, directives.matrix);
    }
    await this.strip.show();
    this.rendered = key;
    this.logger.info({ matrix: directives.matrix?.text ?? null }, `Matrix: ${directives.matrix?.text ?? 'idle'}`);
  }

  async shutdown(): Promise<void> {
    if (!this.options.enabled || !this.strip) {
      return;
    }
    try {
      this.strip.fill(OFF);
      await this.strip.show();
    } finally {
      this.rendered = null;
      await this.strip.close();
      this.logger.info('Matrix display stopped');
    }
  }

  private draw(strip: PixelStrip, matrix: MatrixText): void {
    const pitch = this.font.width + this.font.spacing;
    const rows = Math.min(strip.height, this.font.height);
    [...matrix.text].forEach((char, glyphIndex) => {
      const color = scaleColor(matrix.colors[glyphIndex] ?? OFF, this.options.brightness);
      const columns = textColumns(char, this.font);
      columns.forEach((bits, columnIndex) => {
        const x = matrix.column + glyphIndex * pitch + columnIndex;
        for (let y = 0; y < rows; y += 1) {
          if ((bits & (1 << y)) === 0) {
            continue;
          }
          const index = mapXyToPixel(x, y, strip.width, strip.height, this.options.layout);
          if (index !== null) {
            strip.set(index, color);
          }
        }
      });
    });
  }
}
