import { describe, it, before, after } from 'node:test'
import assert from 'node:assert/strict'
import { mkdir, writeFile } from 'fs/promises'
import { join } from 'path'
import {
  createVersionPolicy,
  detectServerVersion,
  getPortPair,
  loadVersionPolicy,
} from '../../core/version-policy'
import {
  compareVersionCores,
  isAtLeast,
  versionFromKernelJar,
} from '../../core/version-utils'
import { ErrorCodes, ServerManagerError } from '../../core/error-handler'
import { createInstallation, makeTempDir, removeDir } from '../utils/fixtures'

describe('version utils', () => {
  it('compares numerically, not lexically', () => {
    assert.ok(compareVersionCores('10.0.0', '3.0.0') > 0)
    assert.ok(compareVersionCores('2.3.9', '3.0.0') < 0)
  })

  it('ignores prerelease suffixes', () => {
    assert.equal(compareVersionCores('3.0.0-M01', '3.0.0'), 0)
    assert.equal(isAtLeast('3.0.0-M01', '3.0.0'), true)
  })

  it('treats missing segments as zero', () => {
    assert.equal(compareVersionCores('3.0', '3.0.0'), 0)
  })

  it('reads the version from a kernel jar name', () => {
    assert.equal(versionFromKernelJar('neo4j-kernel-3.5.1.jar'), '3.5.1')
    assert.equal(versionFromKernelJar('neo4j-kernel-3.0.0-M01.jar'), '3.0.0-M01')
    assert.equal(versionFromKernelJar('neo4j-cypher-3.5.1.jar'), null)
  })
})

describe('getPortPair', () => {
  it('puts https one below http', () => {
    assert.deepEqual(getPortPair(7474), { http: 7474, https: 7473 })
  })
})

describe('createVersionPolicy', () => {
  const root = join('/srv', 'neo4j')

  it('uses neo4j.conf and run/neo4j.pid from 3.0.0', () => {
    const policy = createVersionPolicy(root, '3.5.1')
    assert.equal(policy.modernLayout, true)
    assert.equal(policy.configPath, join(root, 'conf', 'neo4j.conf'))
    assert.equal(policy.pidPath, join(root, 'run', 'neo4j.pid'))
  })

  it('uses the legacy files before 3.0.0', () => {
    const policy = createVersionPolicy(root, '2.3.0')
    assert.equal(policy.modernLayout, false)
    assert.equal(policy.configPath, join(root, 'conf', 'neo4j-server.properties'))
    assert.equal(policy.pidPath, join(root, 'data', 'neo4j-service.pid'))
  })

  it('treats milestone builds of 3.0.0 and two-digit majors as modern', () => {
    assert.equal(createVersionPolicy(root, '3.0.0-M01').modernLayout, true)
    assert.equal(createVersionPolicy(root, '10.0.0').modernLayout, true)
  })

  it('builds connector properties for modern servers', () => {
    assert.deepEqual(createVersionPolicy(root, '3.5.1').portProperties(7474), {
      'dbms.connector.https.enabled': false,
      'dbms.connector.http.enabled': true,
      'dbms.connector.http.address': '0.0.0.0:7474',
      'dbms.connector.https.address': 'localhost:7473',
    })
  })

  it('builds webserver properties for legacy servers', () => {
    assert.deepEqual(createVersionPolicy(root, '2.3.0').portProperties(7474), {
      'org.neo4j.server.webserver.https.enabled': false,
      'org.neo4j.server.webserver.port': 7474,
      'org.neo4j.server.webserver.https.port': 7473,
    })
  })

  it('writes both auth property names', () => {
    assert.deepEqual(createVersionPolicy(root, '3.5.1').authProperties(false), {
      'dbms.security.authorization_enabled': 'false',
      'dbms.security.auth_enabled': 'false',
    })
  })
})

describe('detectServerVersion', () => {
  let dir: string

  before(async () => {
    dir = await makeTempDir()
  })

  after(async () => {
    await removeDir(dir)
  })

  it('reads the installed kernel jar', async () => {
    const installPath = join(dir, 'installed')
    await createInstallation(installPath, { version: '2.3.0' })

    assert.equal(await detectServerVersion(installPath), '2.3.0')
    const policy = await loadVersionPolicy(installPath)
    assert.equal(policy.modernLayout, false)
  })

  it('fails with VERSION_UNDETECTED without a lib directory', async () => {
    await assert.rejects(
      detectServerVersion(join(dir, 'empty')),
      (error: unknown) =>
        error instanceof ServerManagerError &&
        error.code === ErrorCodes.VERSION_UNDETECTED,
    )
  })

  it('fails with VERSION_UNDETECTED when no kernel jar is present', async () => {
    const installPath = join(dir, 'no-kernel')
    await mkdir(join(installPath, 'lib'), { recursive: true })
    await writeFile(join(installPath, 'lib', 'neo4j-cypher-3.5.1.jar'), '')

    await assert.rejects(
      detectServerVersion(installPath),
      (error: unknown) =>
        error instanceof ServerManagerError &&
        error.code === ErrorCodes.VERSION_UNDETECTED,
    )
  })
})
