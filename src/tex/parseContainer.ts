import { InvalidLineError } from '../errors'
import { warn } from '../logger'
import { container } from '../script/container'
import { Container, ContainerKind, Span } from '../script/types'
import { unescapeTex } from './normalize'
import { parseSpan } from './parseSpan'
import { regexPartition } from './partition'

const LINE_PATTERN = /^\\(.*?)\{(.*)\}$/

// one-argument command invocations inside a line body
const SPAN_COMMAND = /\\.+?\{.*?\}/g

export const CONTAINER_KINDS: ReadonlyMap<string, ContainerKind> = new Map<string, ContainerKind>([
  ['spoken', 'spoken'],
  ['stagedir', 'stageDir'],
  ['listener', 'listenerDialogue'],
  ['sfx', 'sfx']
])

/**
 * Parses one body line of the form `\cmd{…}`.
 *
 * Unknown block commands fall back to plain text with a warning; a span that
 * fails to parse aborts the line.
 */
export function parseContainer(line: string): Container {
  const text = unescapeTex(line)
  const m = text.match(LINE_PATTERN)
  if (!m) throw new InvalidLineError(line)

  const [, command, body] = m
  let kind = CONTAINER_KINDS.get(command)
  if (!kind) {
    warn(`Could not identify container kind for command: ${command}`)
    kind = 'plainText'
  }

  const spans: Span[] = []
  for (const fragment of regexPartition(SPAN_COMMAND, body)) {
    if (!fragment) continue
    try {
      spans.push(parseSpan(fragment))
    } catch (err) {
      throw new InvalidLineError(line, err)
    }
  }

  return container(kind, spans)
}
