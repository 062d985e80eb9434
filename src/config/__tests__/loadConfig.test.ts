/**
 * loadConfig tests
 * Tests config loading, merging, caching, and fallback behavior
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { mkdirSync, writeFileSync, rmSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'

const TEST_DIR = join(tmpdir(), `stepwise-config-test-${Date.now()}`)
const HOME_DIR = join(TEST_DIR, 'home')
const PROJECT_DIR = join(TEST_DIR, 'project')

// 避免读到真实的 ~/.stepwise.yaml
vi.mock('os', async importOriginal => {
  const os = await importOriginal<typeof import('os')>()
  return { ...os, homedir: () => HOME_DIR }
})

const { loadConfig, getDefaultConfig, clearConfigCache, applyEnvOverrides } = await import(
  '../loadConfig.js'
)

beforeEach(() => {
  clearConfigCache()
  mkdirSync(HOME_DIR, { recursive: true })
  mkdirSync(PROJECT_DIR, { recursive: true })
  vi.stubEnv('STEPWISE_ENGINE_URL', '')
  vi.stubEnv('STEPWISE_ENGINE_MODEL', '')
  vi.stubEnv('STEPWISE_API_KEY', '')
})

afterEach(() => {
  clearConfigCache()
  vi.unstubAllEnvs()
  rmSync(TEST_DIR, { recursive: true, force: true })
})

describe('loadConfig', () => {
  it('should return default config when no config file exists', async () => {
    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should load config from the project YAML file', async () => {
    writeFileSync(
      join(PROJECT_DIR, '.stepwise.yaml'),
      `
engine:
  model: llama3
  baseURL: http://localhost:1234/v1
execution:
  taskDelayMs: 0
`
    )

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config.engine.model).toBe('llama3')
    expect(config.engine.baseURL).toBe('http://localhost:1234/v1')
    expect(config.execution.taskDelayMs).toBe(0)
    expect(config.knowledge.maxPatterns).toBe(200)
  })

  it('should let project config override global config field by field', async () => {
    writeFileSync(
      join(HOME_DIR, '.stepwise.yaml'),
      'engine:\n  model: global-model\n  maxTokens: 1000\n'
    )
    writeFileSync(join(PROJECT_DIR, '.stepwise.yaml'), 'engine:\n  model: project-model\n')

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config.engine.model).toBe('project-model')
    expect(config.engine.maxTokens).toBe(1000)
  })

  it('should fall back to defaults for an invalid config', async () => {
    writeFileSync(join(PROJECT_DIR, '.stepwise.yaml'), 'execution:\n  taskDelayMs: soon\n')

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should treat an empty file as no settings', async () => {
    writeFileSync(join(PROJECT_DIR, '.stepwise.yaml'), '# nothing here\n')

    const config = await loadConfig({ cwd: PROJECT_DIR })
    expect(config).toEqual(getDefaultConfig())
  })

  it('should cache the loaded config until cleared', async () => {
    const first = await loadConfig({ cwd: PROJECT_DIR })
    writeFileSync(join(PROJECT_DIR, '.stepwise.yaml'), 'engine:\n  model: changed\n')

    expect(await loadConfig({ cwd: PROJECT_DIR })).toBe(first)

    clearConfigCache()
    expect((await loadConfig({ cwd: PROJECT_DIR })).engine.model).toBe('changed')
  })
})

describe('applyEnvOverrides', () => {
  it('should override engine settings from the environment', () => {
    vi.stubEnv('STEPWISE_ENGINE_MODEL', 'env-model')
    vi.stubEnv('STEPWISE_API_KEY', 'test-secret')

    const config = applyEnvOverrides(getDefaultConfig())
    expect(config.engine.model).toBe('env-model')
    expect(config.engine.apiKey).toBe('test-secret')
    expect(config.engine.baseURL).toBe('http://localhost:11434/v1')
  })

  it('should leave config untouched without env overrides', () => {
    const defaults = getDefaultConfig()
    expect(applyEnvOverrides(defaults)).toBe(defaults)
  })
})
