#!/usr/bin/env node
import 'dotenv/config'
import process from 'node:process'
import {resolve} from 'node:path'
import chalk from 'chalk'
import type {Command} from 'commander'
import {DockerCliExecutor} from '../engine/docker-executor.js'
import {configFromEnv, defaultConfigFile, loadConfigFile, resolveConfig} from '../core/config.js'
import {Engine} from '../core/engine.js'
import {createLogger} from '../core/logger.js'
import {CoordinatorClient} from '../core/transport.js'
import {EngineError} from '../errors.js'
import {cliSource, createProgram, readCertificate, type CliOptions} from './options.js'

async function main() {
  const program = createProgram()

  program
    .action(async (api: string | undefined, engineId: string | undefined, sslCert: string | undefined, options: CliOptions, cmd: Command) => {
      const fileSource = options.config
        ? await loadConfigFile(resolve(options.config), {required: true})
        : await loadConfigFile(resolve(defaultConfigFile))
      const config = resolveConfig(
        fileSource,
        configFromEnv(process.env),
        cliSource({api, engineId, sslCert}, options, cmd)
      )

      const logger = createLogger({level: config.logLevel})
      const certificate = config.certificate ? await readCertificate(resolve(config.certificate)) : undefined
      const coordinator = new CoordinatorClient({
        apiUrl: config.apiUrl,
        engineId: config.engineId,
        certificate,
        verify: config.verify
      })

      const executor = new DockerCliExecutor({host: config.dockerHost})
      await executor.check()

      const engine = new Engine(coordinator, executor, logger, {
        scope: {group: config.group, project: config.project},
        workdir: config.workdir ? resolve(config.workdir) : undefined,
        scratchPath: config.scratchPath,
        keepContainers: config.keepContainers,
        idleDelayMs: config.idleDelaySec * 1000
      })

      const controller = new AbortController()
      const halt = (signal: NodeJS.Signals) => {
        logger.info(`received ${signal} - shutting down after the current job`)
        controller.abort()
      }

      process.on('SIGTERM', halt)
      process.on('SIGINT', halt)

      logger.info({api: config.apiUrl, engineId: config.engineId}, 'engine started')
      await engine.run(controller.signal)
      logger.warn('engine halted')
    })

  await program.parseAsync()
}

try {
  await main()
} catch (error: unknown) {
  if (error instanceof EngineError) {
    console.error(chalk.red(error.message))
    process.exitCode = 1
  } else {
    console.error('Fatal error:', error)
    throw error
  }
}
