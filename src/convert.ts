import fsp from 'node:fs/promises'
import path from 'node:path'
import { UnsupportedConversionError } from './errors'
import { exportMarkdown, scriptToMarkdown } from './exporters/markdownExporter'
import { debug, info } from './logger'
import { scriptWordCount } from './script/document'
import { Script } from './script/types'
import { formatWordCount } from './script/wordCount'
import { parseScript } from './tex/parseScript'

export type FileFormat = 'tex' | 'markdown'

const EXTENSIONS: Readonly<Record<string, FileFormat>> = {
  '.tex': 'tex',
  '.md': 'markdown'
}

export function fileFormatFromPath(filePath: string): FileFormat {
  const ext = path.extname(filePath)
  if (!ext) throw new UnsupportedConversionError(`Invalid file extension: could not be determined for ${filePath}`)
  const format = Object.hasOwn(EXTENSIONS, ext) ? EXTENSIONS[ext] : undefined
  if (!format) throw new UnsupportedConversionError(`Invalid file extension: should be .tex / .md, got ${filePath}`)
  return format
}

/** Only TeX → Markdown is supported. */
export function assertSupportedConversion(from: FileFormat, to: FileFormat) {
  if (from !== 'tex' || to !== 'markdown') {
    throw new UnsupportedConversionError(`Only doing TeX -> Markdown (requested ${from} -> ${to})`, from, to)
  }
}

export const convertText = (tex: string): string => scriptToMarkdown(parseScript(tex))

export interface ConvertOptions {
  cwd?: string
  densityDecimals?: number
}

export async function readScript(infile: string, opts: ConvertOptions = {}): Promise<Script> {
  const inPath = path.resolve(opts.cwd ?? process.cwd(), infile)
  debug('Reading from', inPath)
  const tex = await fsp.readFile(inPath, 'utf8')
  return parseScript(tex)
}

/**
 * Converts `infile` (.tex) into `outfile` (.md). The pairing is checked before
 * anything is read; nothing is written if parsing fails.
 */
export async function convertFile(infile: string, outfile: string, opts: ConvertOptions = {}): Promise<Script> {
  const from = fileFormatFromPath(infile)
  const to = fileFormatFromPath(outfile)
  debug(`${from} -> ${to}`)
  assertSupportedConversion(from, to)

  const script = await readScript(infile, opts)
  info(`Title: ${script.title}`)
  info(`Words: ${formatWordCount(scriptWordCount(script), opts.densityDecimals)}`)

  const { outPath } = await exportMarkdown(path.resolve(opts.cwd ?? process.cwd(), outfile), script)
  debug('Markdown written to', outPath)
  return script
}
