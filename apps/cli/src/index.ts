import { Command } from 'commander'
import { errorFields, makeLogger } from '@batch-sweep/logger'
import { App, type CommonOptions, type RunOptions } from './app.js'

const logger = makeLogger('cli')
const program = new Command()

const VALID_COMMANDS = new Set(['run', 'plan', 'collect'])

function fail(err: unknown): void {
  logger.fatal(err instanceof Error ? err.message : String(err), errorFields(err))
  process.exitCode = 1
}

const withCommonOptions = (command: Command): Command =>
  command
    .option('-c, --config <file>', 'JSON study file (tables, machines, tracker settings)')
    .option('--work-dir <dir>', 'Directory where run inputs are prepared')
    .option('--out-dir <dir>', 'Directory for figure_a.png and figure_b.png')
    .option('--simulate', 'Use an in-memory batch service and bucket', false)

program
  .name('batch-sweep')
  .description('Submit a parameter sweep to a batch service and chart the timings')
  .version('0.1.0')

// batch-sweep run --config study.json
withCommonOptions(program.command('run'))
  .description('Submit every run, wait for completion, collect timings and render charts')
  .option('--cancel-on-abort', 'Cancel already-submitted jobs when the study aborts')
  .action(async (opts: RunOptions) => {
    try {
      const summary = await App.run(opts)
      console.log(
        `${summary.tracking.succeeded.length} succeeded, ${summary.tracking.failed.length} failed`,
      )
      for (const figure of summary.figures) {
        console.log(`${figure.figure}: ${figure.status}`)
      }
    } catch (err) {
      fail(err)
    }
  })

// batch-sweep plan
withCommonOptions(program.command('plan'))
  .description('Print the sweep matrix and the job specs without submitting anything')
  .action(async (opts: CommonOptions) => {
    try {
      const { matrix, specs } = await App.plan(opts)
      for (const run of matrix.all) {
        console.log(`${run.study}\t${run.runName}\t${run.device}\t${run.nodes}`)
      }
      console.log(JSON.stringify(specs, null, 2))
    } catch (err) {
      fail(err)
    }
  })

// batch-sweep collect --out-dir figures
withCommonOptions(program.command('collect'))
  .description('Collect existing timing artifacts and render charts; submits nothing')
  .action(async (opts: CommonOptions) => {
    try {
      const { results, figures } = await App.collect(opts)
      for (const result of results) {
        console.log(`${result.config.runName}\t${result.value ?? 'n/a'}\t${result.source}`)
      }
      for (const figure of figures) {
        console.log(`${figure.figure}: ${figure.status}`)
      }
    } catch (err) {
      fail(err)
    }
  })

const maybeCommand = process.argv[2]

// Only treat it as a command if it's not an option (doesn't start with "-")
if (maybeCommand && !maybeCommand.startsWith('-') && !VALID_COMMANDS.has(maybeCommand)) {
  console.error(
    `Unknown command: "${maybeCommand}".` +
      `\nValid commands are: ${Array.from(VALID_COMMANDS).join(', ')}.`,
  )
  process.exitCode = 1
} else {
  await program.parseAsync(process.argv)
}
