import { createHash } from 'node:crypto';
import { promises as fs } from 'node:fs';
import path from 'node:path';

import { Command } from 'commander';

import { loadConfig, type VaultConfig } from '../config';
import { AssetAbsentError, GateRejectedError, VaultConfigError, errorMessage } from '../errors';
import { AccessGate, type GateDecision } from '../gate/access-gate';
import { ProviderEnsemble, type CreateEnsembleOptions } from '../llm/ensemble';
import { getLogger } from '../observability/logger';
import { createKeychainStore, type KeychainStore } from '../secure/keychain';
import { createDefaultSecretResolver, type ResolveSecret, type SecretName } from '../secure/secrets';
import { VaultSession } from '../session/vault-session';
import { printJson } from '../utils/json-output';
import { ContentStore, type ContentKind } from '../vault/content-store';
import { collectVaultTargets, encryptVault, loadOrCreateKey } from '../vault/encrypt';
import type { MemoryOracleResult } from '../workflows/types';
import { formatGhostText, formatOracleText, formatProvidersText } from './format';
import { createLinePrompter, type LinePrompter } from './prompt';

type OutputStream = Pick<typeof process.stdout, 'write'>;
type ErrorStream = Pick<typeof process.stderr, 'write'>;
type OutputFormat = 'json' | 'text';

export interface CliRuntime {
  env?: NodeJS.ProcessEnv;
  cwd?: string;
  /** `null` disables the OS keychain source. */
  keychain?: KeychainStore | null;
  resolveSecret?: ResolveSecret;
  adapterFactories?: CreateEnsembleOptions['adapterFactories'];
  now?: () => number;
  prompter?: LinePrompter;
  stdout?: OutputStream;
  stderr?: ErrorStream;
}

interface VaultServices {
  config: VaultConfig;
  ensemble: ProviderEnsemble;
  store: ContentStore;
  gate: AccessGate;
}

const SECRET_NAMES: SecretName[] = ['GOOGLE_API_KEY', 'MISTRAL_API_KEY', 'GROQ_API_KEY', 'VAULT_KEY'];
const CONTENT_KINDS: ContentKind[] = ['bytes', 'text', 'json'];

function parseFormat(value: string | undefined): OutputFormat {
  if (value === undefined || value === 'json' || value === 'text') {
    return value ?? 'json';
  }
  throw new Error(`Invalid format: ${value}. Expected json or text.`);
}

function parseSecretName(value: string): SecretName {
  const match = SECRET_NAMES.find((name) => name === value.trim().toUpperCase());
  if (!match) {
    throw new Error(`Invalid secret: ${value}. Expected one of: ${SECRET_NAMES.join(', ')}.`);
  }
  return match;
}

function parseContentKind(value: string): ContentKind {
  const match = CONTENT_KINDS.find((kind) => kind === value.trim().toLowerCase());
  if (!match) {
    throw new Error(`Invalid kind: ${value}. Expected one of: ${CONTENT_KINDS.join(', ')}.`);
  }
  return match;
}

function toRejection(decision: GateDecision): GateRejectedError {
  const reason = decision.reason === 'granted' ? 'no-match' : decision.reason;
  return new GateRejectedError(reason, decision.notice ?? 'Access Denied.');
}

function summarizeOracle(result: MemoryOracleResult, savedTo?: string): unknown {
  if (result.status !== 'ok') {
    return result;
  }
  return {
    status: result.status,
    provider: result.provider,
    selection: result.selection,
    artifact: result.artifact
      ? {
          path: result.artifact.path,
          kind: result.artifact.kind,
          bytes: result.artifact.data.length,
          savedTo
        }
      : null
  };
}

export function createCli(runtime: CliRuntime = {}): Command {
  const env = runtime.env ?? process.env;
  const cwd = runtime.cwd ?? process.cwd();
  const stdout = runtime.stdout ?? process.stdout;
  const stderr = runtime.stderr ?? process.stderr;

  let config: VaultConfig | undefined;
  let keychainPromise: Promise<KeychainStore | undefined> | undefined;
  let servicesPromise: Promise<VaultServices> | undefined;

  const getConfig = (): VaultConfig => {
    if (!config) {
      config = loadConfig(env, cwd);
    }
    return config;
  };

  const getKeychain = (): Promise<KeychainStore | undefined> => {
    if (runtime.keychain !== undefined) {
      return Promise.resolve(runtime.keychain ?? undefined);
    }
    if (!keychainPromise) {
      keychainPromise = createKeychainStore(env);
    }
    return keychainPromise;
  };

  const buildServices = async (): Promise<VaultServices> => {
    const vaultConfig = getConfig();
    const resolveSecret =
      runtime.resolveSecret ??
      createDefaultSecretResolver({ configDir: vaultConfig.configDir, keychain: await getKeychain(), env });

    const ensemble = await ProviderEnsemble.create({
      resolveSecret,
      models: vaultConfig.models,
      timeoutMs: vaultConfig.providerTimeoutMs,
      adapterFactories: runtime.adapterFactories
    });
    const store = new ContentStore({
      rootDir: vaultConfig.rootDir,
      resolveSecret,
      memoriesPath: vaultConfig.memoriesPath,
      chatTranscriptPath: vaultConfig.chatTranscriptPath,
      chatTailChars: vaultConfig.chatTailChars
    });
    const gate = new AccessGate({ ...vaultConfig.gate, now: runtime.now });
    return { config: vaultConfig, ensemble, store, gate };
  };

  const getServices = (): Promise<VaultServices> => {
    if (!servicesPromise) {
      servicesPromise = buildServices();
    }
    return servicesPromise;
  };

  const createSession = async (): Promise<{ services: VaultServices; session: VaultSession }> => {
    const services = await getServices();
    const session = new VaultSession({
      gate: services.gate,
      ensemble: services.ensemble,
      store: services.store,
      participants: services.config.participants
    });
    return { services, session };
  };

  const openSession = async (options: { key: string; as: string }) => {
    const opened = await createSession();
    const decision = opened.session.unlock(options.key);
    if (decision.verdict !== true) {
      throw toRejection(decision);
    }
    opened.session.identify(options.as);
    return opened;
  };

  const runInteractive = async (prompter: LinePrompter): Promise<void> => {
    const { services, session } = await createSession();
    stdout.write('MEMORY VAULT :: SECURE ACCESS\n');

    while (session.stage === 'locked') {
      const phrase = await prompter.ask(':: ACCESS KEY :: ');
      if (phrase === undefined) {
        return;
      }
      const decision = session.unlock(phrase);
      if (decision.notice) {
        stderr.write(`${decision.notice}\n`);
      }
    }

    const [first, second] = session.participants();
    while (session.stage === 'identifying') {
      const answer = await prompter.ask(`Identify yourself (${first}/${second}): `);
      if (answer === undefined) {
        return;
      }
      try {
        const identity = session.identify(answer);
        stdout.write(`USER AUTHENTICATED: ${identity.currentUser.toUpperCase()}\n`);
      } catch (error) {
        if (!(error instanceof VaultConfigError)) {
          throw error;
        }
        stderr.write(`${error.message}\n`);
      }
    }

    stdout.write('Commands: oracle <mood>, ghost <message>, history, quit\n');
    for (;;) {
      const line = await prompter.ask('vault> ');
      if (line === undefined) {
        return;
      }
      const trimmed = line.trim();
      if (!trimmed) {
        continue;
      }

      const spaceAt = trimmed.indexOf(' ');
      const command = (spaceAt === -1 ? trimmed : trimmed.slice(0, spaceAt)).toLowerCase();
      const text = spaceAt === -1 ? '' : trimmed.slice(spaceAt + 1).trim();

      if (command === 'quit' || command === 'exit') {
        return;
      }
      if (command === 'history') {
        for (const message of session.ghostMessages) {
          stdout.write(`[${message.role}] ${message.content}\n`);
        }
        continue;
      }
      if ((command === 'oracle' || command === 'ghost') && !text) {
        stderr.write(`Usage: ${command} <${command === 'oracle' ? 'mood' : 'message'}>\n`);
        continue;
      }
      if (command === 'oracle') {
        const result = await session.consultOracle(text);
        stdout.write(`${formatOracleText(result, services.config.memoriesPath)}\n`);
        continue;
      }
      if (command === 'ghost') {
        const result = await session.sendGhostMessage(text);
        stdout.write(`${formatGhostText(session.identity?.targetPersona ?? 'ghost', result)}\n`);
        continue;
      }
      stderr.write(`Unknown command: ${command}\n`);
    }
  };

  const program = new Command();
  program.name('memory-vault').description('Date-locked memory vault with an AI oracle and ghost writer').version('0.1.0');
  program.option('--error-format <format>', 'text|json', 'text');

  program.exitOverride((error) => {
    if (error.code === 'commander.helpDisplayed' || error.code === 'commander.version') {
      return;
    }
    getLogger().debug({ error: errorMessage(error) }, 'Command line rejected');
    throw error;
  });

  program.configureOutput({
    writeOut: (text: string) => {
      stdout.write(text);
    },
    writeErr: (text: string) => {
      stderr.write(text);
    }
  });

  program
    .command('start')
    .description('Open an interactive vault session')
    .action(async () => {
      const prompter = runtime.prompter ?? createLinePrompter(process.stdin, stdout);
      try {
        await runInteractive(prompter);
      } finally {
        prompter.close();
      }
    });

  program
    .command('unlock')
    .argument('<phrase>', 'Access phrase')
    .description('Check an access phrase against a fresh session')
    .action(async (phrase: string) => {
      const { session } = await createSession();
      const decision = session.unlock(phrase);
      if (decision.verdict !== true) {
        throw toRejection(decision);
      }
      printJson(stdout, decision);
    });

  program
    .command('oracle')
    .description('Pick the memory that fits a mood')
    .requiredOption('--key <phrase>', 'Access phrase')
    .requiredOption('--as <name>', 'Who is asking')
    .requiredOption('--mood <text>', 'Current mood')
    .option('--save <file>', 'Write the chosen artifact to this file')
    .option('--format <format>', 'json|text', 'json')
    .action(async (options: { key: string; as: string; mood: string; save?: string; format?: string }) => {
      const format = parseFormat(options.format);
      const { services, session } = await openSession(options);
      const result = await session.consultOracle(options.mood);

      let savedTo: string | undefined;
      if (result.status === 'ok' && result.artifact && options.save) {
        savedTo = path.resolve(cwd, options.save);
        await fs.writeFile(savedTo, result.artifact.data);
      }

      if (format === 'text') {
        stdout.write(`${formatOracleText(result, services.config.memoriesPath)}\n`);
        return;
      }
      printJson(stdout, summarizeOracle(result, savedTo));
    });

  program
    .command('ghost')
    .description("Reply in the other person's voice")
    .requiredOption('--key <phrase>', 'Access phrase')
    .requiredOption('--as <name>', 'Who is writing')
    .requiredOption('--message <text>', 'Message to answer')
    .option('--format <format>', 'json|text', 'json')
    .action(async (options: { key: string; as: string; message: string; format?: string }) => {
      const format = parseFormat(options.format);
      const { session } = await openSession(options);
      const result = await session.sendGhostMessage(options.message);
      if (format === 'text') {
        stdout.write(`${formatGhostText(session.identity?.targetPersona ?? 'ghost', result)}\n`);
        return;
      }
      printJson(stdout, result);
    });

  program
    .command('providers')
    .description('Show the provider fallback order')
    .option('--format <format>', 'json|text', 'json')
    .action(async (options: { format?: string }) => {
      const format = parseFormat(options.format);
      const { ensemble } = await getServices();
      if (format === 'text') {
        stdout.write(`${formatProvidersText(ensemble.providers())}\n`);
        return;
      }
      printJson(stdout, ensemble.providers());
    });

  const vault = program.command('vault').description('Encrypt and inspect vault assets');

  vault
    .command('keygen')
    .description('Create the vault key file if it does not exist')
    .option('--key-file <path>', 'Key file override')
    .action(async (options: { keyFile?: string }) => {
      const keyFile = options.keyFile ? path.resolve(cwd, options.keyFile) : getConfig().keyFile;
      const loaded = await loadOrCreateKey(keyFile);
      if (loaded.created) {
        stderr.write('IMPORTANT: add this key to your secrets as VAULT_KEY.\n');
        printJson(stdout, { path: loaded.path, created: true, key: loaded.key });
        return;
      }
      printJson(stdout, { path: loaded.path, created: false });
    });

  vault
    .command('encrypt')
    .description('Write <file>.enc next to every vault asset')
    .option('--root <dir>', 'Vault root override')
    .option('--key-file <path>', 'Key file override')
    .option('--dry-run', 'List the files without encrypting them')
    .action(async (options: { root?: string; keyFile?: string; dryRun?: boolean }) => {
      const vaultConfig = getConfig();
      const rootDir = options.root ? path.resolve(cwd, options.root) : vaultConfig.rootDir;
      const targets = { assetsDir: vaultConfig.assetsDir, chatTranscriptPath: vaultConfig.chatTranscriptPath };
      const relative = (file: string) => path.relative(rootDir, file);

      if (options.dryRun) {
        const files = await collectVaultTargets(rootDir, targets);
        printJson(stdout, { files: files.map(relative) });
        return;
      }

      const keyFile = options.keyFile ? path.resolve(cwd, options.keyFile) : vaultConfig.keyFile;
      const loaded = await loadOrCreateKey(keyFile);
      if (loaded.created) {
        stderr.write(`Generated new key in ${loaded.path}. Add it to your secrets as VAULT_KEY.\n`);
      }

      const result = await encryptVault({ rootDir, key: loaded.key, targets });
      printJson(stdout, {
        encrypted: result.encrypted.map((item) => relative(item.target)),
        failed: result.failed.map((item) => ({ file: relative(item.source), error: item.error }))
      });
      if (result.failed.length) {
        throw new Error(`${result.failed.length} file(s) could not be encrypted.`);
      }
    });

  vault
    .command('read')
    .argument('<path>', 'Logical asset path, relative to the vault root')
    .description('Resolve an asset through the vault')
    .requiredOption('--key <phrase>', 'Access phrase')
    .option('--kind <kind>', 'bytes|text|json', 'text')
    .option('--out <file>', 'Write the content to this file instead of stdout')
    .action(async (logicalPath: string, options: { key: string; kind: string; out?: string }) => {
      const kind = parseContentKind(options.kind);
      const { services, session } = await createSession();
      const decision = session.unlock(options.key);
      if (decision.verdict !== true) {
        throw toRejection(decision);
      }
      const { store } = services;
      const content = await store.resolve(logicalPath, kind);
      if (content === undefined) {
        throw new AssetAbsentError(logicalPath);
      }

      if (options.out) {
        const target = path.resolve(cwd, options.out);
        const data = Buffer.isBuffer(content)
          ? content
          : typeof content === 'string'
            ? content
            : `${JSON.stringify(content, null, 2)}\n`;
        await fs.writeFile(target, data);
        printJson(stdout, { path: logicalPath, out: target });
        return;
      }

      if (Buffer.isBuffer(content)) {
        printJson(stdout, {
          path: logicalPath,
          bytes: content.length,
          sha256: createHash('sha256').update(content).digest('hex')
        });
        return;
      }
      if (typeof content === 'string') {
        stdout.write(content.endsWith('\n') ? content : `${content}\n`);
        return;
      }
      printJson(stdout, content);
    });

  const secrets = program.command('secrets').description('Manage secrets in the OS keychain');

  secrets
    .command('set')
    .argument('<name>', SECRET_NAMES.join('|'))
    .requiredOption('--value <value>', 'Secret value')
    .description('Store a secret in the OS keychain')
    .action(async (name: string, options: { value: string }) => {
      const secretName = parseSecretName(name);
      const keychain = await getKeychain();
      if (!keychain) {
        throw new VaultConfigError('No OS keychain backend available. Use secrets.json or environment variables.');
      }
      await keychain.setSecret(secretName, options.value);
      stdout.write(`Stored ${secretName} in ${keychain.backend} keychain\n`);
    });

  secrets
    .command('clear')
    .argument('<name>', SECRET_NAMES.join('|'))
    .description('Remove a secret from the OS keychain')
    .action(async (name: string) => {
      const secretName = parseSecretName(name);
      const keychain = await getKeychain();
      if (!keychain) {
        throw new VaultConfigError('No OS keychain backend available.');
      }
      await keychain.clearSecret(secretName);
      stdout.write(`Removed ${secretName}\n`);
    });

  return program;
}

export async function runCli(argv = process.argv, runtime: CliRuntime = {}): Promise<void> {
  const program = createCli(runtime);
  await program.parseAsync(argv);
}
