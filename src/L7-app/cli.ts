#!/usr/bin/env node
import { Command, Option } from '../L1-infra/cli/cli.js'
import { initConfig, validateRequiredKeys, getConfig } from '../L1-infra/config/environment.js'
import logger, { setVerbose } from '../L1-infra/logger/configLogger.js'
import { fileExists, readTextFileSync } from '../L1-infra/fileSystem/fileSystem.js'
import { projectRoot, join } from '../L1-infra/paths/paths.js'
import { errorMessage } from '../L0-pure/errors/errors.js'
import type { RunMode } from '../L0-pure/types/index.js'
import { runPipeline } from '../L6-pipeline/pipeline.js'
import { runDoctor } from './commands/doctor.js'
import { runInit } from './commands/init.js'

function packageVersion(): string {
  const pkg: unknown = JSON.parse(readTextFileSync(join(projectRoot(), 'package.json')))
  return typeof pkg === 'object' && pkg !== null && 'version' in pkg && typeof pkg.version === 'string'
    ? pkg.version
    : '0.0.0'
}

const version = packageVersion()

const BANNER = `
╔══════════════════════════════════════╗
║   recfetch v${version.padEnd(25)}║
╚══════════════════════════════════════╝
`

interface RunOptions {
  download?: boolean
  transcribe?: boolean
  summarize?: boolean
  input?: string
  all?: boolean
  url?: string
  apiKey?: string
  verbose?: boolean
}

function modeFrom(opts: RunOptions): RunMode {
  if (opts.download) return 'download'
  if (opts.transcribe) return 'transcribe'
  if (opts.summarize) return 'summarize'
  return 'all'
}

const program = new Command()

program
  .name('recfetch')
  .description('Download shared meeting recordings, then transcribe and summarize them')
  .version(version, '-V, --version')

// --- Subcommands ---

program
  .command('init')
  .description('Write a commented .env template in the current directory')
  .action(async () => {
    process.exit(await runInit())
  })

program
  .command('doctor')
  .description('Check all prerequisites and dependencies')
  .action(async () => {
    initConfig()
    process.exit(await runDoctor())
  })

// --- Default command ---
// This must come after subcommands so they take priority

const runCmd = program
  .command('run', { isDefault: true })
  .description('Process the URL file, a single URL, or files already on disk')
  .addOption(new Option('-d, --download', 'Only download videos').conflicts(['transcribe', 'summarize']))
  .addOption(new Option('-t, --transcribe', 'Only transcribe videos').conflicts(['download', 'summarize']))
  .addOption(new Option('-s, --summarize', 'Only summarize transcripts').conflicts(['download', 'transcribe']))
  .option('-i, --input <path>', 'A video (with -t) or transcript (with -s) to process')
  .option('-a, --all', 'With -t or -s: process every recorded video or transcript')
  .option('-u, --url <url>', 'Process this sharing URL instead of the URL file')
  .option('-k, --api-key <key>', 'OpenAI API key (default: env OPENAI_API_KEY)')
  .option('-v, --verbose', 'Verbose logging')
  .action(async () => {
    const opts = runCmd.opts<RunOptions>()

    initConfig({ apiKey: opts.apiKey, verbose: opts.verbose })
    if (opts.verbose) setVerbose()
    logger.info(BANNER)

    const mode = modeFrom(opts)
    const config = getConfig()
    const needsOpenAI = mode === 'transcribe' || mode === 'summarize'
      || (mode === 'all' && (config.ENABLE_TRANSCRIPTION || config.ENABLE_SUMMARY))

    try {
      validateRequiredKeys(needsOpenAI)
    } catch (err: unknown) {
      logger.error(errorMessage(err))
      process.exit(1)
    }

    if (opts.input && !(await fileExists(opts.input))) {
      logger.error(`File not found: ${opts.input}`)
      process.exit(1)
    }

    const summary = await runPipeline({ mode, url: opts.url, input: opts.input, all: opts.all })
    logger.info('Done.')
    process.exit(summary.exitCode)
  })

program.parseAsync().catch((err: unknown) => {
  logger.error(errorMessage(err))
  process.exit(1)
})
