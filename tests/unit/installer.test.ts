import { describe, it, beforeEach, afterEach } from 'node:test'
import assert from 'node:assert/strict'
import { existsSync } from 'fs'
import { mkdir, readFile, readdir, stat, writeFile } from 'fs/promises'
import { join } from 'path'
import { Installer } from '../../core/installer'
import { unixAdapter } from '../../core/platform-adapter'
import { ErrorCodes, ServerManagerError } from '../../core/error-handler'
import { createServerTarball } from '../utils/archives'
import { createInstallation, makeTempDir, removeDir } from '../utils/fixtures'

describe('Installer', { skip: process.platform === 'win32' }, () => {
  let dir: string
  let archiveFile: string
  const installer = new Installer(unixAdapter)

  beforeEach(async () => {
    dir = await makeTempDir('neo4j-installer-test-')
    archiveFile = join(dir, 'neo4j-community-3.5.1-unix.tar.gz')
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  it('extracts the archive without its wrapper directory', async () => {
    await createServerTarball(archiveFile)
    const installPath = join(dir, 'db', 'neo4j', 'development')

    const status = await installer.install(archiveFile, installPath)

    assert.equal(status, 'installed')
    assert.deepEqual((await readdir(installPath)).sort(), ['bin', 'conf', 'lib'])
    assert.equal(installer.isInstalled(installPath), true)
    assert.equal(
      await readFile(join(installPath, 'conf', 'neo4j.conf'), 'utf8'),
      '#dbms.security.auth_enabled=false\n',
    )
  })

  it('makes the bin scripts executable', async () => {
    await createServerTarball(archiveFile)
    const installPath = join(dir, 'install')

    await installer.install(archiveFile, installPath)

    const mode = (await stat(join(installPath, 'bin', 'neo4j'))).mode & 0o777
    assert.equal(mode, 0o755)
  })

  it('deletes the archive after installing', async () => {
    await createServerTarball(archiveFile)

    await installer.install(archiveFile, join(dir, 'install'))

    assert.equal(existsSync(archiveFile), false)
  })

  it('keeps a top-level directory not named like a server', async () => {
    await createServerTarball(archiveFile, { wrapper: 'extras' })
    const installPath = join(dir, 'install')

    await installer.install(archiveFile, installPath)

    assert.deepEqual(await readdir(installPath), ['extras'])
  })

  it('leaves an existing installation and the archive alone', async () => {
    const installPath = join(dir, 'install')
    await createInstallation(installPath, { version: '3.4.0' })
    await writeFile(archiveFile, 'not touched')

    const status = await installer.install(archiveFile, installPath)

    assert.equal(status, 'already-installed')
    assert.equal(await readFile(archiveFile, 'utf8'), 'not touched')
    assert.deepEqual(await readdir(join(installPath, 'lib')), [
      'neo4j-kernel-3.4.0.jar',
    ])
  })

  it('fails with INSTALL_FAILED on a broken archive', async () => {
    await writeFile(archiveFile, 'this is not a tarball')
    const installPath = join(dir, 'install')
    await mkdir(installPath, { recursive: true })

    await assert.rejects(
      installer.install(archiveFile, installPath),
      (error: unknown) =>
        error instanceof ServerManagerError &&
        error.code === ErrorCodes.INSTALL_FAILED,
    )
    assert.equal(installer.isInstalled(installPath), false)
  })
})
