export type TunnelDnsErrorKind =
  | 'missing_dependency'
  | 'empty_input'
  | 'provider'
  | 'no_zones'
  | 'invalid_selection';

/** Base class for every fatal condition the setup wizard can hit. */
export class TunnelDnsError extends Error {
  readonly kind: TunnelDnsErrorKind;

  constructor(kind: TunnelDnsErrorKind, message: string) {
    super(message);
    this.name = new.target.name;
    this.kind = kind;
  }
}

/** A required runtime capability (the HTTP client) is missing. */
export class MissingDependencyError extends TunnelDnsError {
  readonly remediation: string[];

  constructor(message: string, remediation: string[] = []) {
    super('missing_dependency', message);
    this.remediation = remediation;
  }
}

export class EmptyInputError extends TunnelDnsError {
  constructor(message: string) {
    super('empty_input', message);
  }
}

/**
 * Cloudflare reported a failure, or answered with something we could not read.
 * `rawResponse` is kept when the message had to come from the raw body.
 */
export class ProviderError extends TunnelDnsError {
  readonly rawResponse?: string;

  constructor(message: string, rawResponse?: string) {
    super('provider', message);
    this.rawResponse = rawResponse;
  }
}

export class NoZonesError extends TunnelDnsError {
  constructor(message = 'No zones found in your Cloudflare account') {
    super('no_zones', message);
  }
}

export class InvalidSelectionError extends TunnelDnsError {
  constructor(message = 'Invalid selection') {
    super('invalid_selection', message);
  }
}
