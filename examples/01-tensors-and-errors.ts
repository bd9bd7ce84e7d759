/**
 * ndstore: Tensors, Addressing and Errors
 *
 * Builds a tensor, reads it by element and by coordinates, grows it, and
 * shows the errors raised by shape and index mistakes.
 *
 * Run with: npm run example:tensors
 */

import {
  Tensor,
  increasingFrom,
  isTensorError,
  repeating,
  scalarElements,
} from '@ndstore/core';

function main(): void {
  console.log('ndstore: Tensors and Errors\n');
  console.log('='.repeat(50));

  // =============================================================================
  // Construction and Addressing
  // =============================================================================
  console.log('\n1. CONSTRUCTION');
  console.log('-'.repeat(30));

  const t = increasingFrom([3, 4, 5], 0);
  console.log('Shape:', t.shape.toString());
  console.log('Element 1, row 3:', t.at(1).at(3).toString());
  console.log('Unit at [2, 0, 3]:', t.unit([2, 0, 3]));
  console.log('Vector 0..<5:', scalarElements(0, 5).toString());

  // =============================================================================
  // Growth
  // =============================================================================
  console.log('\n2. GROWTH');
  console.log('-'.repeat(30));

  const rows = Tensor.withElementShape<number>([3]);
  rows.append(repeating([3], 1));
  rows.append(Tensor.fromShape([3], [2, 3, 4]));
  console.log('After two appends:', rows.toString());
  const removed = rows.remove(0);
  console.log('Removed:', removed.toString(), 'remaining:', rows.toString());

  // =============================================================================
  // Errors
  // =============================================================================
  console.log('\n3. ERRORS');
  console.log('-'.repeat(30));

  const attempts: [string, () => unknown][] = [
    ['append a row of the wrong length', () => rows.append(repeating([2], 0))],
    ['read past the end', () => t.at(3)],
    ['append to a scalar', () => Tensor.scalar(1).append(Tensor.scalar(2))],
  ];
  for (const [label, attempt] of attempts) {
    try {
      attempt();
    } catch (error) {
      if (!isTensorError(error)) {
        throw error;
      }
      console.log(`${label}: [${error.code}] ${error.message}`);
    }
  }
}

main();
