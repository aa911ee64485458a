/**
 * remote-exec CLI commands
 *
 *   remote-exec ping [--all] [--project <name>] [--settings <file>]
 *   remote-exec exec <command...> [--mode file|statement|evaluate] [--raise]
 *   remote-exec config [--settings <file>]
 */

import { Command } from 'commander';
import { z } from 'zod';
import {
  createRemoteExecutionConfig,
  describeConfig,
  loadProjectConfig,
  parseEndpoint,
  type RemoteExecutionConfig,
  type RemoteExecutionConfigOptions,
} from '@remote-exec/config';
import { ExecMode } from '@remote-exec/protocol';
import { DiscoveryChannel, RemoteSession, nodeTransports, type PeerDescriptor, type SessionTransports } from '@remote-exec/sdk';
import { InvalidConfigError, RemoteExecError } from '@remote-exec/utils/errors';

export interface CliIO {
  out(line: string): void;
  err(line: string): void;
  setExitCode(code: number): void;
}

export interface ProgramOptions {
  io?: CliIO;
  transports?: SessionTransports;
}

const processIO: CliIO = {
  out: (line) => process.stdout.write(line + '\n'),
  err: (line) => process.stderr.write(line + '\n'),
  setExitCode: (code) => {
    process.exitCode = code;
  },
};

const MODES = {
  file: ExecMode.EXECUTE_FILE,
  statement: ExecMode.EXECUTE_STATEMENT,
  evaluate: ExecMode.EVALUATE_STATEMENT,
} as const;

const CommonOptionsSchema = z.object({
  group: z.string().optional(),
  bind: z.string().optional(),
  ttl: z.coerce.number().int().min(0).max(255).optional(),
  project: z.string().optional(),
  settings: z.string().optional(),
  timeout: z.coerce.number().int().positive().optional(),
});

const PingOptionsSchema = CommonOptionsSchema.extend({
  all: z.boolean().optional(),
});

const ExecOptionsSchema = CommonOptionsSchema.extend({
  mode: z.enum(['file', 'statement', 'evaluate']).default('evaluate'),
  raise: z.boolean().optional(),
});

type CommonOptions = z.infer<typeof CommonOptionsSchema>;

function parseOptions<T extends z.ZodTypeAny>(schema: T, raw: unknown): z.infer<T> {
  const parsed = schema.safeParse(raw);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `--${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new InvalidConfigError(`Invalid options: ${details}`);
  }
  return parsed.data;
}

/**
 * Settings file first, then explicit flags on top.
 */
export async function resolveConfig(options: CommonOptions): Promise<RemoteExecutionConfig> {
  const overrides: RemoteExecutionConfigOptions = {};
  if (options.group) overrides.multicastGroup = parseEndpoint(options.group);
  if (options.bind) overrides.multicastBindAddress = options.bind;
  if (options.ttl !== undefined) overrides.multicastTtl = options.ttl;
  if (options.project) overrides.targetName = options.project;

  return options.settings ? loadProjectConfig(options.settings, overrides) : createRemoteExecutionConfig(overrides);
}

function formatPeer(peer: PeerDescriptor): string {
  return `${peer.nodeId}  ${peer.projectName}  ${peer.engineVersion}`;
}

function withNetworkOptions(command: Command): Command {
  return command
    .option('-g, --group <ip:port>', 'Multicast group endpoint')
    .option('-b, --bind <ip>', 'Multicast bind address')
    .option('--ttl <n>', 'Multicast TTL');
}

export function buildProgram(programOptions: ProgramOptions = {}): Command {
  const io = programOptions.io ?? processIO;
  const transports = programOptions.transports ?? nodeTransports;
  const program = new Command();

  // Known failures become one line on stderr; anything else propagates
  const run = async (action: () => Promise<void>): Promise<void> => {
    try {
      await action();
    } catch (err) {
      if (!(err instanceof RemoteExecError)) throw err;
      io.err(err.message);
      io.setExitCode(1);
    }
  };

  program
    .name('remote-exec')
    .description('Discover peers over multicast and run commands on them')
    .version('0.1.0');

  withNetworkOptions(
    program
      .command('ping')
      .description('Find peers on the multicast group')
      .option('-a, --all', 'List every peer that answers')
      .option('-p, --project <name>', 'Only accept this project')
      .option('-s, --settings <file>', 'Project file whose engine settings to use')
      .option('-t, --timeout <ms>', 'Discovery timeout')
  ).action((raw: unknown) =>
    run(async () => {
      const options = parseOptions(PingOptionsSchema, raw);
      const config = await resolveConfig(options);
      const discovery = await DiscoveryChannel.open(config, transports);
      try {
        if (options.all) {
          const peers = await discovery.collectPongs(options.timeout);
          for (const peer of peers) io.out(formatPeer(peer));
          if (peers.length === 0) {
            io.err('No peers answered');
            io.setExitCode(1);
          }
          return;
        }
        io.out(formatPeer(await discovery.ping(options.timeout)));
      } finally {
        await discovery.close();
      }
    })
  );

  withNetworkOptions(
    program
      .command('exec')
      .description('Run a command on the first matching peer')
      .argument('<command...>', 'Command text')
      .option('-m, --mode <mode>', 'file, statement or evaluate', 'evaluate')
      .option('-t, --timeout <ms>', 'Time to wait for the result')
      .option('-r, --raise', 'Exit with an error when the command fails')
      .option('-p, --project <name>', 'Only accept this project')
      .option('-s, --settings <file>', 'Project file whose engine settings to use')
  ).action((commandParts: string[], raw: unknown) =>
    run(async () => {
      const options = parseOptions(ExecOptionsSchema, raw);
      const config = await resolveConfig(options);
      const result = await RemoteSession.run({ config, transports }, (session) =>
        session.execute(commandParts.join(' '), {
          execMode: MODES[options.mode],
          timeoutMs: options.timeout,
          raiseOnFailure: options.raise,
        })
      );

      const rendered = result.toString();
      if (rendered) io.out(rendered);
      if (!result.success) io.setExitCode(1);
    })
  );

  withNetworkOptions(
    program
      .command('config')
      .description('Print the resolved configuration')
      .option('-p, --project <name>', 'Only accept this project')
      .option('-s, --settings <file>', 'Project file whose engine settings to use')
  ).action((raw: unknown) =>
    run(async () => {
      const config = await resolveConfig(parseOptions(CommonOptionsSchema, raw));
      io.out(JSON.stringify({ localId: config.localId, ...describeConfig(config) }, null, 2));
    })
  );

  return program;
}
