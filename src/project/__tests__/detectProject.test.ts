import { describe, it, expect, beforeEach, afterEach } from 'vitest'
import { mkdtempSync, rmSync, writeFileSync } from 'fs'
import { join } from 'path'
import { tmpdir } from 'os'
import { describeProject, detectProject } from '../detectProject.js'

let dir: string

beforeEach(() => {
  dir = mkdtempSync(join(tmpdir(), 'stepwise-project-'))
})

afterEach(() => {
  rmSync(dir, { recursive: true, force: true })
})

describe('detectProject', () => {
  it('returns unknown for an empty directory', () => {
    expect(detectProject(dir)).toEqual({
      rootDir: dir,
      projectType: 'unknown',
      mainLanguage: 'unknown',
      frameworks: [],
    })
  })

  it('detects a TypeScript node project and its frameworks', () => {
    writeFileSync(
      join(dir, 'package.json'),
      JSON.stringify({ dependencies: { express: '^4.0.0' }, devDependencies: { vitest: '^2.0.0' } })
    )
    writeFileSync(join(dir, 'tsconfig.json'), '{}')
    writeFileSync(join(dir, 'package-lock.json'), '{}')

    const context = detectProject(dir)
    expect(context.projectType).toBe('nodejs')
    expect(context.mainLanguage).toBe('typescript')
    expect(context.packageManager).toBe('npm')
    expect(context.frameworks).toEqual(['express', 'vitest'])
    expect(describeProject(context)).toBe('nodejs (typescript, npm) with express, vitest')
  })

  it('tolerates an unreadable package.json', () => {
    writeFileSync(join(dir, 'package.json'), 'not json')
    expect(detectProject(dir).frameworks).toEqual([])
  })

  it('detects a maven project', () => {
    writeFileSync(join(dir, 'pom.xml'), '<project/>')
    expect(describeProject(detectProject(dir))).toBe('java (java, maven)')
  })

  it('detects a python project', () => {
    writeFileSync(join(dir, 'requirements.txt'), 'requests\n')
    expect(describeProject(detectProject(dir))).toBe('python (python)')
  })
})
