import * as dotenv from 'dotenv';
import path from 'path';
import { z } from 'zod';

// Load environment variables from .env file
dotenv.config();

const PROJECT_ROOT = path.resolve(__dirname, '..');

type CliArgs = Record<string, string | boolean>;

const ConfigSchema = z
  .object({
    server: z.object({
      name: z.string().min(1, 'Server name must not be empty'),
      version: z.string().min(1, 'Version must not be empty'),
      debug: z.boolean(),
      host: z.string().min(1, 'Host must not be empty'),
      port: z.number().int().min(0).max(65535),
    }),
    storage: z.object({
      dataDir: z.string().min(1),
      databaseFile: z.string().min(1),
      artifactsDir: z.string().min(1),
    }),
    builder: z.object({
      mode: z.enum(['assistant', 'simulated']),
      command: z.string().min(1, 'Assistant command must not be empty'),
      baseIsoPath: z.string(),
      extraArgs: z.array(z.string()),
      simulatedStepMs: z.number().int().min(0).max(60000),
    }),
    jobQueue: z.object({
      maxConcurrentBuilds: z.number().int().min(1).max(16),
      maxActiveJobs: z.number().int().min(1).max(1000),
      stallTimeoutMs: z.number().int().min(0),
      retentionHours: z.number().min(0),
    }),
  })
  .superRefine((config, ctx) => {
    if (config.builder.mode === 'assistant' && !config.builder.baseIsoPath) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['builder', 'baseIsoPath'],
        message: 'BASE_ISO_PATH is required when BUILDER_MODE=assistant',
      });
    }
    if (config.jobQueue.maxActiveJobs < config.jobQueue.maxConcurrentBuilds) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['jobQueue', 'maxActiveJobs'],
        message: 'Must be at least maxConcurrentBuilds',
      });
    }
  });

export type Config = z.infer<typeof ConfigSchema>;

const DiscoveryConfigSchema = z.object({
  debug: z.boolean(),
  strategy: z.enum(['report', 'patch']),
  answerFilePath: z.string().min(1),
  callbackUrl: z.string().url('Invalid callback URL format'),
  callbackTimeoutMs: z.number().int().min(100).max(120000),
  bootstrap: z.object({
    address: z.string().regex(/^\d{1,3}(\.\d{1,3}){3}\/\d{1,2}$/, 'Expected address/prefix'),
    gateway: z.string().regex(/^\d{1,3}(\.\d{1,3}){3}$/, 'Expected an IPv4 address'),
    dns: z.string().regex(/^\d{1,3}(\.\d{1,3}){3}$/, 'Expected an IPv4 address'),
  }),
  sysRoot: z.string().min(1),
});

export type DiscoveryConfig = z.infer<typeof DiscoveryConfigSchema>;

/**
 * Parse command line arguments
 * Usage: node dist/index.js --port 5000 --builder-mode simulated --debug
 */
export function parseArgs(argv: string[] = process.argv): CliArgs {
  const args: CliArgs = {};

  for (let i = 2; i < argv.length; i++) {
    const arg = argv[i];

    if (arg.startsWith('--')) {
      const key = arg.slice(2);

      // Check if next arg is a value or another flag
      if (i + 1 < argv.length && !argv[i + 1].startsWith('--')) {
        args[key] = argv[++i];
      } else {
        args[key] = true;
      }
    }
  }

  return args;
}

/**
 * Value lookup: CLI flag first, then environment, then default
 */
function sources(cliArgs: CliArgs, env: NodeJS.ProcessEnv) {
  const getString = (cliKey: string, envKey: string, defaultValue: string): string => {
    if (cliArgs[cliKey]) return String(cliArgs[cliKey]);
    return env[envKey] || defaultValue;
  };

  const getBoolean = (cliKey: string, envKey: string, defaultValue: boolean): boolean => {
    if (cliArgs[cliKey] !== undefined) return cliArgs[cliKey] === true || cliArgs[cliKey] === 'true';
    const envValue = env[envKey];
    return envValue === 'true' ? true : envValue === 'false' ? false : defaultValue;
  };

  // NaN is left for the schema to reject
  const getNumber = (cliKey: string, envKey: string, defaultValue: number): number => {
    if (cliArgs[cliKey]) return Number(cliArgs[cliKey]);
    const envValue = env[envKey];
    return envValue ? Number(envValue) : defaultValue;
  };

  const getStringArray = (cliKey: string, envKey: string, defaultValue: string[]): string[] => {
    const value = cliArgs[cliKey] || env[envKey];
    if (!value) return defaultValue;
    return String(value)
      .split(' ')
      .map((s) => s.trim())
      .filter((s) => s.length > 0);
  };

  return { getString, getBoolean, getNumber, getStringArray };
}

function reportAndExit(error: z.ZodError, tips: string[]): never {
  console.error('\n❌ Configuration Validation Failed!\n');
  console.error('Errors:');
  error.errors.forEach((err) => {
    const field = err.path.join('.');
    console.error(`  • ${field || 'root'}: ${err.message}`);
  });
  console.error('\n💡 Tips:');
  tips.forEach((tip) => console.error(`  - ${tip}`));
  console.error();
  process.exit(1);
}

/**
 * Build and validate the server configuration. Throws a ZodError when invalid.
 */
export function loadConfig(argv: string[] = process.argv, env: NodeJS.ProcessEnv = process.env): Config {
  const { getString, getBoolean, getNumber, getStringArray } = sources(parseArgs(argv), env);

  const dataDir = path.resolve(PROJECT_ROOT, getString('data-dir', 'DATA_DIR', 'data'));

  const rawConfig = {
    server: {
      name: getString('server-name', 'SERVER_NAME', 'iso-provisioner'),
      version: getString('server-version', 'SERVER_VERSION', '1.0.0'),
      debug: getBoolean('debug', 'DEBUG', false),
      host: getString('host', 'HOST', '0.0.0.0'),
      port: getNumber('port', 'PORT', 33008),
    },
    storage: {
      dataDir,
      databaseFile: getString('database-file', 'DATABASE_FILE', 'jobs.db'),
      artifactsDir: path.resolve(dataDir, getString('artifacts-dir', 'ARTIFACTS_DIR', 'artifacts')),
    },
    builder: {
      mode: getString('builder-mode', 'BUILDER_MODE', 'simulated'),
      command: getString('assistant-command', 'ASSISTANT_COMMAND', 'proxmox-auto-install-assistant'),
      baseIsoPath: getString('base-iso', 'BASE_ISO_PATH', ''),
      extraArgs: getStringArray('assistant-args', 'ASSISTANT_EXTRA_ARGS', []),
      simulatedStepMs: getNumber('simulated-step-ms', 'SIMULATED_STEP_MS', 1000),
    },
    jobQueue: {
      maxConcurrentBuilds: getNumber('max-concurrent-builds', 'MAX_CONCURRENT_BUILDS', 2),
      maxActiveJobs: getNumber('max-active-jobs', 'MAX_ACTIVE_JOBS', 5),
      stallTimeoutMs: getNumber('stall-timeout-ms', 'STALL_TIMEOUT_MS', 15 * 60 * 1000),
      retentionHours: getNumber('retention-hours', 'RETENTION_HOURS', 72),
    },
  };

  return ConfigSchema.parse(rawConfig);
}

/**
 * Server configuration; exits the process when invalid
 */
export function getConfig(): Config {
  try {
    return loadConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      reportAndExit(error, [
        'Check your .env file',
        'Verify CLI arguments',
        'BUILDER_MODE=assistant needs BASE_ISO_PATH pointing at the stock installer ISO',
      ]);
    }
    throw error;
  }
}

/**
 * Build and validate the discovery agent configuration. Throws a ZodError when invalid.
 */
export function loadDiscoveryConfig(
  argv: string[] = process.argv,
  env: NodeJS.ProcessEnv = process.env
): DiscoveryConfig {
  const { getString, getBoolean, getNumber } = sources(parseArgs(argv), env);

  return DiscoveryConfigSchema.parse({
    debug: getBoolean('debug', 'DEBUG', false),
    strategy: getString('strategy', 'DISCOVERY_STRATEGY', 'patch'),
    answerFilePath: getString('answer-file', 'DISCOVERY_ANSWER_FILE', '/tmp/answer.toml'),
    callbackUrl: getString(
      'callback-url',
      'DISCOVERY_CALLBACK_URL',
      'http://10.0.4.2:5000/api/device_discovery'
    ),
    callbackTimeoutMs: getNumber('callback-timeout-ms', 'DISCOVERY_CALLBACK_TIMEOUT_MS', 10000),
    bootstrap: {
      address: getString('bootstrap-address', 'DISCOVERY_BOOTSTRAP_ADDRESS', '10.0.4.254/24'),
      gateway: getString('bootstrap-gateway', 'DISCOVERY_BOOTSTRAP_GATEWAY', '10.0.4.1'),
      dns: getString('bootstrap-dns', 'DISCOVERY_BOOTSTRAP_DNS', '10.0.4.1'),
    },
    sysRoot: getString('sys-root', 'DISCOVERY_SYS_ROOT', '/sys'),
  });
}

export function getDiscoveryConfig(): DiscoveryConfig {
  try {
    return loadDiscoveryConfig();
  } catch (error) {
    if (error instanceof z.ZodError) {
      reportAndExit(error, [
        'Strategy must be "report" or "patch"',
        'Callback URL must be valid (e.g., http://10.0.4.2:5000/api/device_discovery)',
      ]);
    }
    throw error;
  }
}

/**
 * Print configuration summary
 */
export function printConfigInfo(config: Config): void {
  console.error('╔════════════════════════════════════════════════════════════════════╗');
  console.error('║              ISO Provisioning Server - Configuration               ║');
  console.error('╚════════════════════════════════════════════════════════════════════╝');

  console.error(
    `\n📊 Server: ${config.server.name} v${config.server.version} ${config.server.debug ? '(Debug Mode)' : ''}`
  );
  console.error(`🌐 Listening: http://${config.server.host}:${config.server.port}`);
  console.error(`💾 Data: ${config.storage.dataDir} (artifacts: ${config.storage.artifactsDir})`);

  if (config.builder.mode === 'assistant') {
    console.error(`💿 Builder: ${config.builder.command} (base ISO: ${config.builder.baseIsoPath})`);
  } else {
    console.error(`💿 Builder: simulated (${config.builder.simulatedStepMs}ms per step)`);
  }

  const queue = config.jobQueue;
  console.error(
    `\n⚙️  Queue: ${queue.maxConcurrentBuilds} concurrent | ${queue.maxActiveJobs} active max | stall after ${Math.round(queue.stallTimeoutMs / 1000)}s | keep ${queue.retentionHours}h`
  );

  console.error('\n' + '─'.repeat(70));
}
