import { describe, expect, it } from 'vitest';

import { CLASSICAL_COLOR, QUANTUM_COLOR, mapDisplay } from '../src/core/mapper.js';

describe('mapDisplay', () => {
  it.each([
    { classicalActive: false, quantumActive: false, text: null, column: null },
    { classicalActive: true, quantumActive: false, text: 'HPC', column: 3 },
    { classicalActive: false, quantumActive: true, text: 'Q', column: 9 },
    { classicalActive: true, quantumActive: true, text: 'QCSC', column: 1 }
  ])('classical=$classicalActive quantum=$quantumActive shows $text', ({ classicalActive, quantumActive, text, column }) => {
    const directives = mapDisplay({ classicalActive, quantumActive, nodeActive: {} });
    expect(directives.indicatorA).toBe(classicalActive);
    expect(directives.indicatorB).toBe(quantumActive);
    expect(directives.matrix?.text ?? null).toBe(text);
    expect(directives.matrix?.column ?? null).toBe(column);
  });

  it('colors each matrix glyph by the partition it stands for', () => {
    expect(mapDisplay({ classicalActive: true, quantumActive: false, nodeActive: {} }).matrix?.colors).toEqual([
      CLASSICAL_COLOR,
      CLASSICAL_COLOR,
      CLASSICAL_COLOR
    ]);
    expect(mapDisplay({ classicalActive: false, quantumActive: true, nodeActive: {} }).matrix?.colors).toEqual([
      QUANTUM_COLOR
    ]);
    expect(mapDisplay({ classicalActive: true, quantumActive: true, nodeActive: {} }).matrix?.colors).toEqual([
      QUANTUM_COLOR,
      QUANTUM_COLOR,
      CLASSICAL_COLOR,
      CLASSICAL_COLOR
    ]);
  });

  it('passes node activity through independently of partition activity', () => {
    const nodeActive = { c1: true, c2: false, q1: true };
    expect(mapDisplay({ classicalActive: false, quantumActive: false, nodeActive }).nodeLights).toEqual(nodeActive);
    expect(mapDisplay({ classicalActive: true, quantumActive: true, nodeActive }).nodeLights).toEqual(nodeActive);
  });

  it('does not share the node map with the snapshot', () => {
    const nodeActive = { c1: true };
    const directives = mapDisplay({ classicalActive: false, quantumActive: false, nodeActive });
    expect(directives.nodeLights).not.toBe(nodeActive);
  });
});
