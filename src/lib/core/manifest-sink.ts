import * as fs from 'fs/promises'
import * as path from 'path'
import { ManifestSink } from '../ledger/backend'

/**
 * Writes manifests to `<dir>/<filename>.rtm`, creating the directory as needed. Relative
 * directories are taken from `root`.
 */
export class FileManifestSink implements ManifestSink {
  constructor(private readonly root: string = process.cwd()) {}

  public async write(dir: string, filename: string, serialized: string): Promise<void> {
    const outputDir = path.resolve(this.root, dir)
    await fs.mkdir(outputDir, { recursive: true })
    await fs.writeFile(path.join(outputDir, `${filename}.rtm`), serialized + '\n')
  }
}

/**
 * Keeps written manifests in memory, keyed by `<dir>/<filename>.rtm`.
 */
export class MemoryManifestSink implements ManifestSink {
  public readonly files: Map<string, string> = new Map()

  public async write(dir: string, filename: string, serialized: string): Promise<void> {
    this.files.set(`${dir}/${filename}.rtm`, serialized)
  }
}
