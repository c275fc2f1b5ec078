#!/usr/bin/env node
/**
 * CLI: Diagram Conversion
 *
 * Usage:
 *   diagram-snap
 *
 * Renders every diagrams/*.html in the working directory to a sibling
 * .jpg. Takes no arguments. Exits 1 on the first failure.
 */

import { createBatchConverter } from '../lib/batch/index.js';
import { describeError } from '../lib/errors/index.js';

async function main(): Promise<void> {
  console.log('📸 diagram-snap - HTML to JPEG\n');

  const converter = createBatchConverter();
  const result = await converter.run();

  process.exit(result.exitCode);
}

main().catch((error) => {
  console.error(`❌ Error: ${describeError(error)}`);
  process.exit(1);
});
