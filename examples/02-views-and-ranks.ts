/**
 * ndstore: Views and Ranked Tensors
 *
 * Writes through overlapping views, detects a view left stale by growth,
 * and walks a matrix through its typed elements.
 *
 * Run with: npm run example:views
 */

import { StaleViewError, increasingFrom, repeating } from '@ndstore/core';
import {
  R1,
  R2,
  increasingFrom as rankedIncreasing,
  repeating as rankedRepeating,
} from '@ndstore/ranked';

function main(): void {
  console.log('ndstore: Views and Ranks\n');
  console.log('='.repeat(50));

  // =============================================================================
  // Shared Views
  // =============================================================================
  console.log('\n1. VIEWS');
  console.log('-'.repeat(30));

  const t = increasingFrom([3, 4, 5], 0);
  const element = t.view(1);
  const rows = element.slice([1, 3]);
  element.setSlice([1, 3], repeating([2, 5], -1));
  console.log('Overlapping view sees the write:', rows.toString());
  console.log('Base element 1:', t.at(1).toString());

  const stale = t.view(0);
  t.append(repeating([4, 5], 0));
  try {
    console.log(stale.units);
  } catch (error) {
    if (!(error instanceof StaleViewError)) {
      throw error;
    }
    console.log('Stale view rejected:', error.message);
  }

  // =============================================================================
  // Ranked Tensors
  // =============================================================================
  console.log('\n2. RANKED TENSORS');
  console.log('-'.repeat(30));

  const matrix = rankedIncreasing(R2, [2, 3], 0);
  for (const row of matrix) {
    const values = [...row.tensor].map((value) => value.value);
    console.log('Row:', values.join(', '));
  }

  matrix.setAt(0, { kind: 'tensor', tensor: rankedRepeating(R1, [3], 7) });
  console.log('After setAt:', matrix.toString());
  console.log('Dims as a tuple:', matrix.dims);
}

main();
