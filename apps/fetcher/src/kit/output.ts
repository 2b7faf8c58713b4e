import { randomUUID } from 'node:crypto'
import { rename, rm, writeFile } from 'node:fs/promises'
import { basename, dirname, join } from 'node:path'

/** Destination for the finished artifact. Written at most once per run. */
export interface OutputSink {
  readonly description: string
  write(contents: string): Promise<void>
}

export function streamSink(stream: NodeJS.WritableStream, description = 'stdout'): OutputSink {
  return {
    description,
    write: (contents) =>
      new Promise<void>((resolve, reject) => {
        stream.write(contents, (error) => (error ? reject(error) : resolve()))
      }),
  }
}

/**
 * Write through a temporary sibling and rename, so a reader of `path` sees
 * either the previous artifact or the complete new one.
 */
export function fileSink(path: string): OutputSink {
  return {
    description: path,
    async write(contents) {
      const tmpPath = join(dirname(path), `.${basename(path)}.${randomUUID()}.tmp`)
      try {
        await writeFile(tmpPath, contents, 'utf8')
        await rename(tmpPath, path)
      } catch (error) {
        await rm(tmpPath, { force: true })
        throw error
      }
    },
  }
}
