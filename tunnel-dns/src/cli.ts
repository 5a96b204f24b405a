#!/usr/bin/env node

import { runSetup } from './wizard.js';
import { c, log } from './output.js';

function usage() {
  log('');
  log(`  ${c.bgCyan(' tunnel-dns ')} ${c.dim('Create the A + NS delegation records for a DNS tunnel on Cloudflare')}`);
  log('');
  log('  Commands:');
  log(`    ${c.green('tunnel-dns')}          Run the setup wizard`);
  log(`    ${c.green('tunnel-dns setup')}    Run the setup wizard`);
  log(`    ${c.green('tunnel-dns help')}     Show this help`);
  log('');
}

// --- Main ---

const command = process.argv[2];

switch (command) {
  case undefined:
  case 'setup':
    runSetup().then(code => { process.exit(code); }).catch(err => { console.error(err); process.exit(1); });
    break;
  case 'help':
  case '--help':
  case '-h':
    usage();
    process.exit(0);
  default:
    log(`  ${c.red('✗')} Unknown command: ${command}`);
    usage();
    process.exit(1);
}
