import type { ParserPreference } from '../config.js';
import { MissingDependencyError } from '../errors.js';

export interface DependencyStatus {
  name: string;
  installed: boolean;
  required: boolean;
  description: string;
  /** Per-platform install hints, shown when the dependency is missing */
  remediation: string[];
}

export interface CapabilityReport {
  /** Structured JSON parsing is available; otherwise the text fallback is used */
  richParsing: boolean;
  dependencies: DependencyStatus[];
}

/** The slice of the runtime's globals the checker inspects */
export interface RuntimeGlobals {
  fetch?: unknown;
}

const HTTP_CLIENT_REMEDIATION = [
  'macOS: brew install node@20',
  'Linux: apt-get install nodejs or yum install nodejs (version 20 or later)',
  'Windows: download the Node.js 20 installer from https://nodejs.org/',
];

/**
 * DependencyChecker detects which capabilities the setup run can use.
 * The HTTP client is required; the JSON processor is optional and its
 * absence only downgrades response parsing.
 */
export class DependencyChecker {
  constructor(
    private parserPreference: ParserPreference = 'auto',
    private runtime: RuntimeGlobals = globalThis,
  ) {}

  checkAll(): DependencyStatus[] {
    return [this.checkHttpClient(), this.checkJsonProcessor()];
  }

  checkHttpClient(): DependencyStatus {
    return {
      name: 'fetch',
      installed: typeof this.runtime.fetch === 'function',
      required: true,
      description: 'HTTP client for the Cloudflare API',
      remediation: HTTP_CLIENT_REMEDIATION,
    };
  }

  checkJsonProcessor(): DependencyStatus {
    return {
      name: 'json',
      installed: this.parserPreference !== 'text',
      required: false,
      description: 'Structured JSON response parsing',
      remediation: ['Unset TUNNEL_DNS_PARSER or set "parser": "auto" in config.json'],
    };
  }

  /**
   * Throws MissingDependencyError when a required capability is absent,
   * otherwise reports whether rich parsing can be used.
   */
  detect(): CapabilityReport {
    const dependencies = this.checkAll();
    const missing = dependencies.find(d => d.required && !d.installed);
    if (missing) {
      throw new MissingDependencyError(`${missing.name} is not available (${missing.description})`, missing.remediation);
    }
    const json = dependencies.find(d => d.name === 'json');
    return { richParsing: json?.installed ?? false, dependencies };
  }
}
