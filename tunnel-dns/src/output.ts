// --- Colors & formatting ---

/** Plain text when piped or when NO_COLOR is set */
const colorEnabled = () => process.stdout.isTTY === true && !process.env.NO_COLOR;

function paint(code: string) {
  return (s: string) => (colorEnabled() ? `\x1b[${code}m${s}\x1b[0m` : s);
}

export const c = {
  green: paint('32'),
  red: paint('31'),
  yellow: paint('33'),
  blue: paint('34'),
  dim: paint('90'),
  bgCyan: paint('46;30'),
};

export function log(msg: string) { console.log(msg); }
export function ok(msg: string) { log(`  ${c.green('✓')} ${msg}`); }
export function fail(msg: string) { log(`  ${c.red('✗')} ${msg}`); }
export function warn(msg: string) { log(`  ${c.yellow('!')} ${msg}`); }
export function info(msg: string) { log(`  ${c.dim(msg)}`); }
