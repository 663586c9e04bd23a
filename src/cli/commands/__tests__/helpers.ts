/**
 * Shared fixtures for CLI command tests: temp project directories, output
 * capture and scripted model capabilities.
 */

import { vi, type Mock } from 'vitest'
import { mkdir, mkdtemp, writeFile } from 'fs/promises'
import { join } from 'path'
import { tmpdir } from 'os'
import type { Generator, Planner, Reviewer } from '../../../adapters/types.js'
import type { Plan, QualityJudgment, WorkItemDefinition } from '../../../core/types.js'

export function item(id: string, filePath: string, dependencyIds: number[] = []): WorkItemDefinition {
  return {
    id,
    filePath,
    fileStatus: 'new',
    mode: 'coder',
    description: `Write ${filePath}`,
    dependencyIds,
    tags: ['app'],
  }
}

export const PLAN: Plan = {
  summary: 'A model and a view',
  rationale: 'view needs the model',
  items: [item('model', 'src/model.ts'), item('view', 'src/view.ts', [0])],
}

export const PASS: QualityJudgment = { score: 0.9, passed: true, feedback: 'good' }
export const FAIL: QualityJudgment = { score: 0.2, passed: false, feedback: 'missing exports' }

export interface FakeCapabilities {
  planner: { plan: Mock<Planner['plan']> }
  generator: { generate: Mock<Generator['generate']> }
  reviewer: { review: Mock<Reviewer['review']> }
}

export interface FakeOptions {
  plan?: Plan
  /** Judgment for a review request */
  judge?: (request: string) => QualityJudgment
}

/** Generated content is `// <n>` for the n-th generate call */
export function fakeCapabilities(options: FakeOptions = {}): FakeCapabilities {
  const plan = options.plan ?? PLAN
  const judge = options.judge ?? (() => PASS)
  let calls = 0
  return {
    planner: { plan: vi.fn<Planner['plan']>(() => Promise.resolve(plan)) },
    generator: {
      generate: vi.fn<Generator['generate']>(() => {
        calls += 1
        return Promise.resolve(`// ${String(calls)}\n`)
      }),
    },
    reviewer: { review: vi.fn<Reviewer['review']>((request) => Promise.resolve(judge(request))) },
  }
}

export interface TestProject {
  root: string
  globalConfigDir: string
  /** Write `.threadsmith/config.yaml` */
  writeConfig(content: string): Promise<void>
}

export async function createTestProject(): Promise<TestProject> {
  const root = await mkdtemp(join(tmpdir(), 'threadsmith-cli-test-'))
  const globalConfigDir = join(root, 'global')
  return {
    root,
    globalConfigDir,
    writeConfig: async (content) => {
      await mkdir(join(root, '.threadsmith'), { recursive: true })
      await writeFile(join(root, '.threadsmith', 'config.yaml'), content, 'utf-8')
    },
  }
}

export interface CapturedOutput {
  getStdout: () => string
  getStderr: () => string
  /** Non-empty stdout lines */
  stdoutLines: () => string[]
  restore: () => void
}

export function captureOutput(): CapturedOutput {
  let stdout = ''
  let stderr = ''
  const stdoutSpy = vi.spyOn(process.stdout, 'write').mockImplementation((data: string | Uint8Array) => {
    stdout += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  const stderrSpy = vi.spyOn(process.stderr, 'write').mockImplementation((data: string | Uint8Array) => {
    stderr += typeof data === 'string' ? data : Buffer.from(data).toString()
    return true
  })
  return {
    getStdout: () => stdout,
    getStderr: () => stderr,
    stdoutLines: () => stdout.split('\n').filter((line) => line !== ''),
    restore: (): void => {
      stdoutSpy.mockRestore()
      stderrSpy.mockRestore()
    },
  }
}

/** Parse NDJSON stdout into `{ event, data }` records */
export function parseEvents(stdout: string): Array<{ event: string; data: unknown }> {
  return stdout
    .split('\n')
    .filter((line) => line !== '')
    .map((line) => {
      const parsed: unknown = JSON.parse(line)
      if (typeof parsed !== 'object' || parsed === null || !('event' in parsed) || typeof parsed.event !== 'string') {
        throw new Error(`Not an event line: ${line}`)
      }
      return { event: parsed.event, data: 'data' in parsed ? parsed.data : undefined }
    })
}
