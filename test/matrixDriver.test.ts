import { describe, expect, it } from 'vitest';

import { CLASSICAL_COLOR, QUANTUM_COLOR, mapDisplay } from '../src/core/mapper.js';
import { MatrixDriver, scaleColor } from '../src/display/matrixDriver.js';
import { SimulatedPixelStrip } from '../src/hardware/simulated.js';
import type { Rgb } from '../src/types.js';

const WIDTH = 24;
const HEIGHT = 8;

const classical = mapDisplay({ classicalActive: true, quantumActive: false, nodeActive: {} });
const quantum = mapDisplay({ classicalActive: false, quantumActive: true, nodeActive: {} });
const both = mapDisplay({ classicalActive: true, quantumActive: true, nodeActive: {} });
const idle = mapDisplay({ classicalActive: false, quantumActive: false, nodeActive: {} });

function lit(frame: readonly Rgb[]): number {
  return frame.filter(([r, g, b]) => r + g + b > 0).length;
}

function rowMajor(strip: SimulatedPixelStrip, brightness = 1): MatrixDriver {
  return new MatrixDriver(strip, { enabled: true, brightness, layout: 'row-major' });
}

describe('scaleColor', () => {
  it('scales and rounds every channel', () => {
    expect(scaleColor(CLASSICAL_COLOR, 0.5)).toEqual([0, 128, 0]);
    expect(scaleColor(QUANTUM_COLOR, 0.5)).toEqual([0, 75, 128]);
    expect(scaleColor(QUANTUM_COLOR, 0)).toEqual([0, 0, 0]);
    expect(scaleColor(QUANTUM_COLOR, 1)).toEqual([0, 150, 255]);
  });
});

describe('MatrixDriver', () => {
  it('draws HPC from column 3 in color A', async () => {
    const strip = new SimulatedPixelStrip(WIDTH, HEIGHT);
    await rowMajor(strip).apply(classical);
    const frame = strip.shown();
    // left stroke of H
    for (let y = 0; y < 7; y += 1) {
      expect(frame[y * WIDTH + 3]).toEqual(CLASSICAL_COLOR);
    }
    expect(frame[7 * WIDTH + 3]).toEqual([0, 0, 0]);
    // crossbar of H on row 3, nothing left of column 3
    expect(frame[3 * WIDTH + 4]).toEqual(CLASSICAL_COLOR);
    expect(frame[0 * WIDTH + 4]).toEqual([0, 0, 0]);
    expect(frame[3 * WIDTH + 2]).toEqual([0, 0, 0]);
    expect(lit(frame)).toBe(45);
  });

  it('draws Q from column 9 in color B', async () => {
    const strip = new SimulatedPixelStrip(WIDTH, HEIGHT);
    await rowMajor(strip).apply(quantum);
    const frame = strip.shown();
    expect(frame[1 * WIDTH + 9]).toEqual(QUANTUM_COLOR);
    expect(frame[0 * WIDTH + 9]).toEqual([0, 0, 0]);
    expect(lit(frame)).toBe(17);
  });

  it('draws QC in color B and SC in color A when both partitions are busy', async () => {
    const strip = new SimulatedPixelStrip(WIDTH, HEIGHT);
    await rowMajor(strip).apply(both);
    const frame = strip.shown();
    // C at x=7 and S at x=13 both light row 1
    expect(frame[1 * WIDTH + 7]).toEqual(QUANTUM_COLOR);
    expect(frame[1 * WIDTH + 13]).toEqual(CLASSICAL_COLOR);
    // last C ends on the right edge
    expect(frame[1 * WIDTH + 23]).toEqual(CLASSICAL_COLOR);
  });

  it('applies brightness to drawn pixels', async () => {
    const strip = new SimulatedPixelStrip(WIDTH, HEIGHT);
    await rowMajor(strip, 0.5).apply(classical);
    expect(strip.shown()[3]).toEqual([0, 128, 0]);
  });

  it('maps pixels through the configured layout', async () => {
    const strip = new SimulatedPixelStrip(WIDTH, HEIGHT);
    await new MatrixDriver(strip, { enabled: true, brightness: 1, layout: 'serpentine-rows' }).apply(classical);
    // row 1 runs right to left: x=3 lands on index 24 + 20
    expect(strip.shown()[44]).toEqual(CLASSICAL_COLOR);
    expect(strip.shown()[27]).toEqual([0, 0, 0]);
  });

  it('clears the matrix when nothing is running', async () => {
    const strip = new SimulatedPixelStrip(WIDTH, HEIGHT);
    const driver = rowMajor(strip);
    await driver.apply(classical);
    await driver.apply(idle);
    expect(lit(strip.shown())).toBe(0);
    expect(strip.shows).toBe(2);
  });

  it('does not redraw an unchanged directive', async () => {
    const strip = new SimulatedPixelStrip(WIDTH, HEIGHT);
    const driver = rowMajor(strip);
    await driver.apply(classical);
    await driver.apply(classical);
    await driver.apply(quantum);
    await driver.apply(quantum);
    expect(strip.shows).toBe(2);
  });

  it('never writes when disabled', async () => {
    const strip = new SimulatedPixelStrip(WIDTH, HEIGHT);
    const driver = new MatrixDriver(strip, { enabled: false, brightness: 1, layout: 'row-major' });
    await driver.apply(classical);
    await driver.apply(both);
    await driver.shutdown();
    expect(strip.shows).toBe(0);
    expect(strip.closed).toBe(false);
  });

  it('requires a strip when enabled', () => {
    expect(() => new MatrixDriver(null, { enabled: true, brightness: 1, layout: 'row-major' })).toThrow(
      'An enabled matrix needs a pixel strip'
    );
  });

  it('blanks and closes the strip on shutdown', async () => {
    const strip = new SimulatedPixelStrip(WIDTH, HEIGHT);
    const driver = rowMajor(strip);
    await driver.apply(both);
    await driver.shutdown();
    expect(lit(strip.shown())).toBe(0);
    expect(strip.closed).toBe(true);
  });
});
