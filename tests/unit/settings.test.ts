import { describe, it, beforeEach, afterEach } from 'node:test'
import assert from 'node:assert/strict'
import { readFile, writeFile } from 'fs/promises'
import { join } from 'path'
import { SettingsManager, isSettingKey } from '../../config/settings'
import { ErrorCodes, ServerManagerError } from '../../core/error-handler'
import { makeTempDir, removeDir } from '../utils/fixtures'

describe('SettingsManager', () => {
  let dir: string
  let settingsPath: string

  beforeEach(async () => {
    dir = await makeTempDir('neo4j-settings-test-')
    settingsPath = join(dir, 'nested', 'config.json')
  })

  afterEach(async () => {
    await removeDir(dir)
  })

  it('starts empty when no file exists', async () => {
    assert.deepEqual(await new SettingsManager(settingsPath).load(), {})
  })

  it('persists a setting across instances', async () => {
    await new SettingsManager(settingsPath).set('installRoot', '/srv/neo4j')

    const reloaded = new SettingsManager(settingsPath)
    assert.equal(await reloaded.get('installRoot'), '/srv/neo4j')

    const onDisk: unknown = JSON.parse(await readFile(settingsPath, 'utf8'))
    assert.ok(typeof onDisk === 'object' && onDisk !== null)
    assert.equal(typeof Reflect.get(onDisk, 'updatedAt'), 'string')
  })

  it('stores the stop timeout as a number', async () => {
    const settings = new SettingsManager(settingsPath)
    await settings.set('stopTimeoutSeconds', '30')

    assert.equal(await settings.get('stopTimeoutSeconds'), 30)
  })

  it('rejects a stop timeout that is not a positive number', async () => {
    const settings = new SettingsManager(settingsPath)

    for (const value of ['0', '-5', 'soon', '2147484']) {
      await assert.rejects(
        settings.set('stopTimeoutSeconds', value),
        (error: unknown) =>
          error instanceof ServerManagerError &&
          error.code === ErrorCodes.CONFIG_ERROR,
      )
    }
    assert.equal(await settings.get('stopTimeoutSeconds'), undefined)
  })

  it('removes a setting on unset', async () => {
    const settings = new SettingsManager(settingsPath)
    await settings.set('catalogUrl', 'https://catalog.test/versions.json')
    await settings.unset('catalogUrl')

    assert.equal(
      await new SettingsManager(settingsPath).get('catalogUrl'),
      undefined,
    )
  })

  it('resets a corrupted file to defaults', async () => {
    const corruptPath = join(dir, 'config.json')
    await writeFile(corruptPath, '{not json')

    const settings = new SettingsManager(corruptPath)

    const loaded = await settings.load()

    assert.deepEqual(Object.keys(loaded), ['updatedAt'])
    assert.deepEqual(
      Object.keys(JSON.parse(await readFile(corruptPath, 'utf8'))),
      ['updatedAt'],
    )
  })

  it('ignores unknown keys and values of the wrong type', async () => {
    const path = join(dir, 'config.json')
    await writeFile(
      path,
      JSON.stringify({
        installRoot: 42,
        downloadBaseUrl: 'https://dist.test',
        colour: 'blue',
      }),
    )

    assert.deepEqual(await new SettingsManager(path).load(), {
      downloadBaseUrl: 'https://dist.test',
    })
  })
})

describe('isSettingKey', () => {
  it('recognises the known keys only', () => {
    assert.equal(isSettingKey('stopTimeoutSeconds'), true)
    assert.equal(isSettingKey('updatedAt'), false)
    assert.equal(isSettingKey('colour'), false)
  })
})
