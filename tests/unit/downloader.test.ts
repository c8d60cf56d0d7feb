import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import { readFile, readdir } from 'fs/promises'
import { basename } from 'path'
import { Downloader } from '../../core/downloader'
import { unixAdapter, windowsAdapter } from '../../core/platform-adapter'
import { ErrorCodes, ServerManagerError } from '../../core/error-handler'
import { createFakeFetch, makeTempDir, removeDir } from '../utils/fixtures'

const BASE_URL = 'https://dist.test'

describe('Downloader', () => {
  let tempRoot: string

  before(async () => {
    tempRoot = await makeTempDir('neo4j-download-test-')
  })

  after(async () => {
    await removeDir(tempRoot)
  })

  it('builds the unix archive url', () => {
    const downloader = new Downloader(unixAdapter, { baseUrl: BASE_URL })
    assert.equal(
      downloader.getDownloadUrl('community-3.5.1'),
      'https://dist.test/neo4j-community-3.5.1-unix.tar.gz',
    )
  })

  it('builds the windows archive url', () => {
    const downloader = new Downloader(windowsAdapter, { baseUrl: BASE_URL })
    assert.equal(
      downloader.getDownloadUrl('community-3.5.1'),
      'https://dist.test/neo4j-community-3.5.1-windows.zip',
    )
  })

  it('strips trailing slashes from the base url', () => {
    const downloader = new Downloader(unixAdapter, {
      baseUrl: 'https://dist.test//',
    })
    assert.equal(
      downloader.getDownloadUrl('3.5.1'),
      'https://dist.test/neo4j-3.5.1-unix.tar.gz',
    )
  })

  it('fails with ARCHIVE_UNAVAILABLE when the HEAD request is not 2xx', async () => {
    const { fetch, calls } = createFakeFetch(
      () => new Response(null, { status: 404 }),
    )
    const downloader = new Downloader(unixAdapter, {
      baseUrl: BASE_URL,
      fetchImpl: fetch,
      tempRoot,
    })

    await assert.rejects(
      downloader.download('community-9.9.9'),
      (error: unknown) => {
        assert.ok(error instanceof ServerManagerError)
        assert.equal(error.code, ErrorCodes.ARCHIVE_UNAVAILABLE)
        assert.equal(
          error.message,
          'community-9.9.9 is not available to download',
        )
        return true
      },
    )
    assert.equal(calls.length, 1)
    assert.equal(calls[0].method, 'HEAD')
  })

  it('writes the archive bytes unchanged to a temporary file', async () => {
    const bytes = new Uint8Array([0x1f, 0x8b, 0x00, 0xff, 0x0d, 0x0a])
    const { fetch, calls } = createFakeFetch((call) =>
      call.method === 'HEAD'
        ? new Response(null, { status: 200 })
        : new Response(bytes),
    )
    const downloader = new Downloader(unixAdapter, {
      baseUrl: BASE_URL,
      fetchImpl: fetch,
      tempRoot,
    })

    const stages: string[] = []
    const archiveFile = await downloader.download('community-3.5.1', (p) =>
      stages.push(p.stage),
    )

    assert.deepEqual([...(await readFile(archiveFile))], [...bytes])
    assert.ok(basename(archiveFile).endsWith('neo4j-community-3.5.1-unix.tar.gz'))
    assert.deepEqual(
      calls.map((call) => call.method),
      ['HEAD', 'GET'],
    )
    assert.deepEqual(stages, ['downloading'])
  })

  it('fails with DOWNLOAD_FAILED and leaves no file behind', async () => {
    const emptyRoot = await makeTempDir('neo4j-download-fail-')
    const { fetch } = createFakeFetch((call) =>
      call.method === 'HEAD'
        ? new Response(null, { status: 200 })
        : new Response('boom', { status: 500 }),
    )
    const downloader = new Downloader(unixAdapter, {
      baseUrl: BASE_URL,
      fetchImpl: fetch,
      tempRoot: emptyRoot,
    })

    try {
      await assert.rejects(
        downloader.download('community-3.5.1'),
        (error: unknown) =>
          error instanceof ServerManagerError &&
          error.code === ErrorCodes.DOWNLOAD_FAILED,
      )
      assert.deepEqual(await readdir(emptyRoot), [])
    } finally {
      await removeDir(emptyRoot)
    }
  })
})
