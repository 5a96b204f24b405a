import {
  CloudflareClient,
  DelegationConfigurator,
  DependencyChecker,
  EmptyInputError,
  MissingDependencyError,
  ProviderError,
  TunnelDnsError,
  createResponseParser,
  debug,
  fetchZones,
  looksLikeIpv4,
  resolveConfig,
  selectZone,
  type CloudflareCredentials,
  type DnsRecordInput,
  type RandomSource,
  type TunnelDnsConfig,
} from '@tunnel-dns/core';
import { createPrompter, type Prompter } from './prompt.js';
import { c, fail, info, log, ok, warn } from './output.js';

export interface SetupOptions {
  prompter?: Prompter;
  config?: TunnelDnsConfig;
  checker?: DependencyChecker;
  /** Letter picker override, mainly for tests */
  random?: RandomSource;
}

function header(title: string, color: (s: string) => string) {
  log(color('========================================'));
  log(color(title));
  log(color('========================================'));
}

async function collectCredentials(prompter: Prompter): Promise<CloudflareCredentials> {
  log(c.yellow('Cloudflare API Credentials:'));
  const email = (await prompter.ask('Enter your Cloudflare Email: ')).trim();
  const apiKey = (await prompter.askSecret('Enter your Cloudflare API Key: ')).trim();

  if (!email || !apiKey) {
    throw new EmptyInputError('Email and API Key are required');
  }
  return { email, apiKey };
}

async function collectServerIp(prompter: Prompter): Promise<string> {
  const serverIp = (await prompter.ask('Enter server IP address: ')).trim();
  if (!serverIp) throw new EmptyInputError('Server IP is required');

  if (!looksLikeIpv4(serverIp)) {
    warn(c.yellow('IP format may be invalid, continuing anyway...'));
  }
  return serverIp;
}

function describeRecord(record: DnsRecordInput) {
  log(c.blue(`Creating ${record.type} record:`));
  info(`Name: ${record.name}`);
  info(`Type: ${record.type}`);
  info(`Content: ${record.content}`);
  info(`Proxied: ${record.proxied}`);
  log('');
}

function reportFailure(err: unknown) {
  log('');
  if (err instanceof MissingDependencyError) {
    fail(c.red(`Error: ${err.message}`));
    for (const hint of err.remediation) info(hint);
  } else if (err instanceof ProviderError) {
    fail(c.red(`Error: ${err.message}`));
    if (err.rawResponse !== undefined) info(`Response: ${err.rawResponse}`);
  } else if (err instanceof TunnelDnsError) {
    fail(c.red(`Error: ${err.message}`));
  } else {
    fail(c.red(`Unexpected error: ${err instanceof Error ? err.message : String(err)}`));
  }
}

/**
 * Interactive setup: pick a zone, then create a random A record for the
 * tunnel server and an NS record delegating a second label to it.
 * Resolves to the process exit code.
 */
export async function runSetup(options: SetupOptions = {}): Promise<number> {
  const prompter = options.prompter ?? createPrompter();

  header('Cloudflare DNS Setup', c.blue);
  log('');

  try {
    const config = options.config ?? resolveConfig();
    const checker = options.checker ?? new DependencyChecker(config.parser);

    const capabilities = checker.detect();
    if (!capabilities.richParsing) {
      warn(c.yellow('JSON parsing is disabled. Falling back to basic text parsing.'));
      const json = capabilities.dependencies.find(d => d.name === 'json');
      for (const hint of json?.remediation ?? []) info(hint);
      log('');
    }

    const credentials = await collectCredentials(prompter);
    const cf = new CloudflareClient(credentials, {
      apiBase: config.apiBase,
      parser: createResponseParser(capabilities.richParsing),
    });

    log('');
    log(c.blue('Fetching your domains...'));
    const zones = await fetchZones(cf);
    debug('wizard', `${zones.length} zone(s) available`);

    log('');
    log(c.yellow('Available domains:'));
    log('');
    zones.forEach((zone, i) => log(`  ${c.green(String(i + 1))}. ${zone.name}`));
    log('');

    const selection = await prompter.ask(`Select domain by number (1-${zones.length}): `);
    const zone = selectZone(zones, selection);
    ok(c.green(`Selected domain: ${zone.name}`));
    ok(c.green(`Zone ID: ${zone.id}`));
    log('');

    const serverIp = await collectServerIp(prompter);

    log('');
    log(c.blue('Setting up DNS records...'));
    log('');

    const dns = new DelegationConfigurator(cf, options.random);
    const result = await dns.createDelegation(zone, serverIp, {
      onPlanned: describeRecord,
      onCreated: (record) => {
        ok(c.green(`${record.type} record created: ${record.name} -> ${record.content}`));
        log('');
      },
    });

    header('Setup Complete!', c.green);
    log('');
    log(c.blue('DNS Records Created:'));
    log(`  ${c.yellow('A Record:')}  ${result.aRecord.name} -> ${result.aRecord.content} (unproxied)`);
    log(`  ${c.yellow('NS Record:')} ${result.nsRecord.name} -> ${result.nsRecord.content} (unproxied)`);
    log('');
    log(`${c.blue('Use this DNS name for your DNS tunnel server:')} ${result.tunnelDomain}`);
    log('');
    log(c.green('All done!'));
    return 0;
  } catch (err) {
    reportFailure(err);
    return 1;
  }
}
