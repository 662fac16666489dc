import {readFile} from 'node:fs/promises'
import {Command} from 'commander'
import {defaultConfigFile, type ConfigSource} from '../core/config.js'
import {ConfigError} from '../errors.js'

export type CliOptions = {
  config?: string;
  verify: boolean;
  dockerHost?: string;
  remove: boolean;
  workdir?: string;
  scratch?: string;
  group?: string;
  project?: string;
  idleDelay?: string;
  logLevel?: string;
}

export type CliArguments = {
  api?: string;
  engineId?: string;
  sslCert?: string;
}

/**
 * The `job-engine` command, without its action.
 */
export function createProgram(): Command {
  return new Command()
    .name('job-engine')
    .description('Claims jobs from a coordinator and runs them in Docker containers')
    .version('0.1.0')
    .argument('[api]', 'Coordinator API root, e.g. https://www.example.com/api')
    .argument('[engine-id]', 'Engine identification')
    .argument('[ssl-cert]', 'Path to the client certificate (PEM with key)')
    .option('-c, --config <file>', `YAML configuration file (default: ./${defaultConfigFile} when present)`)
    .option('--no-verify', 'Do not verify the coordinator TLS certificate')
    .option('--docker-host <url>', 'TCP or unix socket of the Docker daemon')
    .option('--no-remove', 'Do not remove containers after the job stops')
    .option('--workdir <path>', 'Parent directory of job staging areas')
    .option('--scratch <path>', 'Host directory mounted read-only at /scratch')
    .option('--group <group>', 'Only claim jobs of this group')
    .option('--project <project>', 'Only claim jobs of this project')
    .option('--idle-delay <seconds>', 'Delay between claims when there is no work')
    .option('--log-level <level>', 'Log level: fatal, error, warn, info, debug, trace, silent')
}

/**
 * Configuration given on the command line. Options left at their commander
 * default (e.g., `verify` without `--no-verify`) are omitted so that the
 * environment and the configuration file still apply.
 */
export function cliSource(args: CliArguments, options: CliOptions, cmd: Command): ConfigSource {
  const given = (name: keyof CliOptions) => cmd.getOptionValueSource(name) === 'cli'
  const source: ConfigSource = {
    apiUrl: args.api,
    engineId: args.engineId,
    certificate: args.sslCert
  }

  if (given('verify')) {
    source.verify = options.verify
  }

  if (given('remove')) {
    source.keepContainers = !options.remove
  }

  if (given('dockerHost')) {
    source.dockerHost = options.dockerHost
  }

  if (given('workdir')) {
    source.workdir = options.workdir
  }

  if (given('scratch')) {
    source.scratchPath = options.scratch
  }

  if (given('group')) {
    source.group = options.group
  }

  if (given('project')) {
    source.project = options.project
  }

  if (given('idleDelay')) {
    source.idleDelaySec = options.idleDelay
  }

  if (given('logLevel')) {
    source.logLevel = options.logLevel
  }

  return source
}

export async function readCertificate(path: string): Promise<Buffer> {
  try {
    return await readFile(path)
  } catch (error) {
    throw new ConfigError(`Cannot read certificate ${path}`, {cause: error})
  }
}
