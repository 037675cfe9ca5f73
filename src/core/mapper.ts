import type { CanonicalSnapshot, DisplayDirectives, MatrixText, Rgb } from '../types.js';

/** Color A: classical partition activity. */
export const CLASSICAL_COLOR: Rgb = [0, 255, 0];
/** Color B: quantum partition activity. */
export const QUANTUM_COLOR: Rgb = [0, 150, 255];

const HPC: MatrixText = {
  text: 'HPC',
  colors: [CLASSICAL_COLOR, CLASSICAL_COLOR, CLASSICAL_COLOR],
  column: 3
};

const QUANTUM: MatrixText = {
  text: 'Q',
  colors: [QUANTUM_COLOR],
  column: 9
};

// "QC" in color B, "SC" in color A
const QCSC: MatrixText = {
  text: 'QCSC',
  colors: [QUANTUM_COLOR, QUANTUM_COLOR, CLASSICAL_COLOR, CLASSICAL_COLOR],
  column: 1
};

export function mapDisplay(snapshot: CanonicalSnapshot): DisplayDirectives {
  const { classicalActive, quantumActive } = snapshot;
  let matrix: MatrixText | null = null;
  if (classicalActive && quantumActive) {
    matrix = QCSC;
  } else if (classicalActive) {
    matrix = HPC;
  } else if (quantumActive) {
    matrix = QUANTUM;
  }

  return {
    indicatorA: classicalActive,
    indicatorB: quantumActive,
    matrix,
    nodeLights: { ...snapshot.nodeActive }
  };
}
