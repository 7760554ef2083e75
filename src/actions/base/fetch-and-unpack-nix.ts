import fs from 'fs-extra'
import http from 'node:http'
import https from 'node:https'
import path from 'path'
import { pipeline } from 'node:stream/promises'
import { fileURLToPath } from 'node:url'
import { z } from 'zod'

import type { Action, ActionContext, ActionDescription } from '../../core/action.js'
import { describe } from '../../core/action.js'
import { throwIfCancelled } from '../../core/cancel.js'
import { executeCommand } from '../../core/command.js'
import { ActionError, CancelledError, IoError } from '../../core/errors.js'
import { removePath } from '../../core/fs-ops.js'
import { StatefulAction } from '../../core/stateful.js'

export const FetchAndUnpackNixParams = z.object({
  url: z.string().url(),
  dest: z.string().min(1),
  sslCertFile: z.string().optional(),
})

export type FetchAndUnpackNixInput = z.input<typeof FetchAndUnpackNixParams>

const SUPPORTED_PROTOCOLS = ['http:', 'https:', 'file:']
const MAX_REDIRECTS = 5
const ARCHIVE_NAME = 'nix.tar'

function checkUrl(raw: string): URL {
  const url = new URL(raw)
  if (!SUPPORTED_PROTOCOLS.includes(url.protocol)) {
    throw new ActionError('unsupported_url', `Unknown url scheme, \`file://\`, \`https://\` and \`http://\` supported: ${raw}`)
  }
  return url
}

function get(url: URL, signal: AbortSignal, ca: Buffer | undefined): Promise<http.IncomingMessage> {
  return new Promise((resolve, reject) => {
    const onResponse = (res: http.IncomingMessage) => resolve(res)
    const req = url.protocol === 'https:'
      ? https.get(url, { signal, ca }, onResponse)
      : http.get(url, { signal }, onResponse)
    req.on('error', reject)
  })
}

async function download(url: URL, to: string, signal: AbortSignal, ca: Buffer | undefined, redirects = 0): Promise<void> {
  const res = await get(url, signal, ca)
  const status = res.statusCode ?? 0
  const location = res.headers.location
  if (status >= 300 && status < 400 && location) {
    res.resume()
    if (redirects >= MAX_REDIRECTS) {
      throw new ActionError('fetch', `Too many redirects fetching \`${url.href}\``)
    }
    await download(new URL(location, url), to, signal, ca, redirects + 1)
    return
  }
  if (status < 200 || status >= 300) {
    res.resume()
    throw new ActionError('fetch', `Fetching \`${url.href}\` returned HTTP ${status}`)
  }
  await pipeline(res, fs.createWriteStream(to), { signal })
}

/**
 * Fetch the Nix tarball from a URL (or a local `file://` path) and unpack it into `dest`.
 */
export class FetchAndUnpackNix implements Action {
  readonly tag = 'fetch_and_unpack_nix'

  private constructor(private readonly params: z.output<typeof FetchAndUnpackNixParams>) {}

  get dest(): string {
    return this.params.dest
  }

  static async plan(input: FetchAndUnpackNixInput): Promise<StatefulAction<FetchAndUnpackNix>> {
    const params = FetchAndUnpackNixParams.parse(input)
    checkUrl(params.url)
    return StatefulAction.uncompleted(new FetchAndUnpackNix(params))
  }

  static fromJSON(raw: unknown): FetchAndUnpackNix {
    return new FetchAndUnpackNix(FetchAndUnpackNixParams.parse(raw))
  }

  tracingSynopsis(): string {
    return `Fetch \`${this.params.url}\` to \`${this.params.dest}\``
  }

  tracingFields(): Record<string, unknown> {
    return { url: this.params.url, dest: this.params.dest }
  }

  executeDescription(): ActionDescription[] {
    return [describe(this.tracingSynopsis())]
  }

  revertDescription(): ActionDescription[] {
    return [describe(`Remove the unpacked Nix at \`${this.params.dest}\``)]
  }

  async execute(ctx: ActionContext): Promise<void> {
    const { dest, sslCertFile } = this.params
    const url = checkUrl(this.params.url)
    await fs.ensureDir(dest)
    const archive = path.join(dest, ARCHIVE_NAME)

    try {
      if (url.protocol === 'file:') {
        await fs.copy(fileURLToPath(url), archive)
      } else {
        const ca = sslCertFile ? await fs.readFile(sslCertFile) : undefined
        await download(url, archive, ctx.signal, ca)
      }
    } catch (e) {
      if (ctx.signal.aborted) throw new CancelledError(`fetching \`${url.href}\``)
      if (e instanceof ActionError) throw e
      throw new ActionError('fetch', `Fetching \`${url.href}\`: ${e instanceof Error ? e.message : String(e)}`, { cause: e })
    }

    throwIfCancelled(ctx.signal)
    await executeCommand('tar', ['-xf', archive, '-C', dest], { logger: ctx.logger, sslCertFile })
    try {
      await fs.remove(archive)
    } catch (e) {
      throw new IoError('Removing', archive, e)
    }
  }

  async revert(_ctx: ActionContext): Promise<void> {
    await removePath(this.params.dest)
  }

  toJSON(): Record<string, unknown> {
    return { ...this.params }
  }
}
