#!/usr/bin/env tsx
/**
 * Decode colorimeter notification frames captured from a sniffer or a debug log
 *
 *   npm run decode -- "ab 20 0b 00 02 00 57 00"
 */

import { program } from 'commander';
import { decodeNotification } from '../src/core/ColorPackets';
import { fromHex, hex } from '../src/utils/codec';
import { errorMessage } from '../src/utils/errors';

// ==================== CLI ====================

function main() {
  program
    .name('decode-frame')
    .description('Decode colorimeter notification frames given as hex')
    .argument('<frames...>', 'hex frames (spaces and colons are ignored)')
    .option('--pretty', 'indent the JSON output', false)
    .parse();

  const opts = program.opts<{ pretty: boolean }>();
  let failed = false;

  for (const arg of program.args) {
    let frame: Buffer;
    try {
      frame = fromHex(arg);
    } catch (err) {
      console.error(`❌ ${arg}: ${errorMessage(err)}`);
      failed = true;
      continue;
    }
    const decoded = decodeNotification(frame);
    const record = { frame: hex(frame), length: frame.length, ...decoded };
    console.log(JSON.stringify(record, null, opts.pretty ? 2 : undefined));
    if (decoded.kind === 'unrecognized') failed = true;
  }

  process.exit(failed ? 1 : 0);
}

main();
