export * from './errors'
export * from './script/types'
export * from './script/wordCount'
export * from './script/span'
export * from './script/container'
export * from './script/series'
export * from './script/document'
export { unescapeTex } from './tex/normalize'
export { regexPartition } from './tex/partition'
export { parseSpan, INLINE_KINDS } from './tex/parseSpan'
export { parseContainer, CONTAINER_KINDS } from './tex/parseContainer'
export { HEADER_FIELDS, parseTags, readHeader, searchTex } from './tex/header'
export type { Header, HeaderField } from './tex/header'
export { parseScript, scriptBody } from './tex/parseScript'
export { containerToMarkdown, exportMarkdown, scriptToMarkdown, spanToMarkdown } from './exporters/markdownExporter'
export type { ContainerRenderOptions } from './exporters/markdownExporter'
export { assertSupportedConversion, convertFile, convertText, fileFormatFromPath, readScript } from './convert'
export type { ConvertOptions, FileFormat } from './convert'
