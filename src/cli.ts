#!/usr/bin/env node
import { loadEnvConfig } from './config'
import { convertFile, fileFormatFromPath, readScript } from './convert'
import { UnsupportedConversionError } from './errors'
import { error, setLogLevel } from './logger'
import { describeScript } from './script/document'

const USAGE = [
  'Usage: dramatex <command> [args] [-v|--verbose] [-q|--quiet]',
  'Commands:',
  '  convert <input.tex> <output.md>   render a script as Markdown',
  '  stats <input.tex>                 print header fields, word count and parsed spans'
].join('\n')

async function cmdConvert(input: string | undefined, output: string | undefined, densityDecimals: number) {
  if (!input || !output) throw new Error('Usage: convert <input.tex> <output.md>')
  await convertFile(input, output, { densityDecimals })
  console.log('Markdown written to', output)
}

async function cmdStats(input: string | undefined, densityDecimals: number) {
  if (!input) throw new Error('Usage: stats <input.tex>')
  if (fileFormatFromPath(input) !== 'tex') throw new UnsupportedConversionError(`Expected a .tex file: ${input}`)
  const script = await readScript(input)
  console.log(describeScript(script, densityDecimals))
}

/** Runs the CLI and resolves to the process exit code. */
export async function main(argv: string[]): Promise<number> {
  const flags = new Set(argv.filter((a) => a.startsWith('-')))
  const [cmd, ...args] = argv.filter((a) => !a.startsWith('-'))

  try {
    const config = loadEnvConfig()
    setLogLevel(config.logLevel)
    if (flags.has('-v') || flags.has('--verbose')) setLogLevel('debug')
    if (flags.has('-q') || flags.has('--quiet')) setLogLevel('error')

    if (cmd === 'convert') await cmdConvert(args[0], args[1], config.densityDecimals)
    else if (cmd === 'stats') await cmdStats(args[0], config.densityDecimals)
    else {
      console.log(USAGE)
      return 1
    }
  } catch (err) {
    error(err instanceof Error ? err.message : String(err))
    return 1
  }
  return 0
}

if (require.main === module) {
  main(process.argv.slice(2)).then((code) => {
    process.exitCode = code
  })
}

export { cmdConvert, cmdStats }
