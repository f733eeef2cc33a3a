import fsp from 'fs/promises'
import path from 'path'

/** Writes to a `.partial` sibling first, then renames over `filePath`. */
export async function atomicWrite(filePath: string, data: string) {
  const dir = path.dirname(filePath)
  const base = path.basename(filePath)
  const tmp = path.join(dir, `.${base}.partial`)
  await fsp.mkdir(dir, { recursive: true })
  await fsp.writeFile(tmp, data, 'utf8')
  await fsp.rename(tmp, filePath)
}
