/**
 * Request-level tracing, written to stderr so it never mixes with the
 * wizard's prompts. On when TUNNEL_DNS_DEBUG is set to anything but 0/false.
 */
export function debugEnabled(): boolean {
  const flag = process.env.TUNNEL_DNS_DEBUG?.trim().toLowerCase();
  return !!flag && flag !== '0' && flag !== 'false';
}

export function debug(tag: string, message: string): void {
  if (debugEnabled()) console.error(`[${tag}] ${message}`);
}

export function debugWarn(tag: string, message: string): void {
  if (debugEnabled()) console.error(`[${tag}] warning: ${message}`);
}
