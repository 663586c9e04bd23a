/**
 * Tests for `threadsmith resume`
 */

import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest'
import { readFile, rm } from 'fs/promises'
import { join } from 'path'
import { RUN_EXIT_FAILED_ITEMS, RUN_EXIT_SUCCESS, RUN_EXIT_USAGE, runRunAction } from '../run.js'
import { runResumeAction } from '../resume.js'
import {
  FAIL,
  PASS,
  captureOutput,
  createTestProject,
  fakeCapabilities,
  type CapturedOutput,
  type TestProject,
} from './helpers.js'

let project: TestProject
let output: CapturedOutput

beforeEach(async () => {
  project = await createTestProject()
  output = captureOutput()
})

afterEach(async () => {
  output.restore()
  vi.restoreAllMocks()
  await rm(project.root, { recursive: true, force: true })
})

function baseOptions() {
  return {
    projectRoot: project.root,
    globalConfigDir: project.globalConfigDir,
    env: {},
    outputFormat: 'human' as const,
    apply: false,
  }
}

describe('runResumeAction', () => {
  it('restores accepted items and re-runs the failed one', async () => {
    const firstExit = await runRunAction({
      ...baseOptions(),
      request: 'Build the app',
      runId: 'run-1',
      maxIterations: 1,
      capabilities: fakeCapabilities({ judge: (request) => (request.includes('src/view.ts') ? FAIL : PASS) }),
    })
    expect(firstExit).toBe(RUN_EXIT_FAILED_ITEMS)
    output.restore()
    output = captureOutput()

    const capabilities = fakeCapabilities()
    const exitCode = await runResumeAction({ ...baseOptions(), apply: true, runId: 'run-1', capabilities })

    expect(exitCode).toBe(RUN_EXIT_SUCCESS)
    expect(capabilities.planner.plan).not.toHaveBeenCalled()
    expect(capabilities.generator.generate).toHaveBeenCalledTimes(1)
    expect(output.stdoutLines()).toEqual([
      'Resuming run run-1',
      'Planned 2 items in 2 batches',
      '✓ model already done',
      '→ view (src/view.ts)',
      '  iteration 1: score 0.90 (passed)',
      '✓ view accepted after 1 iteration',
      'Run run-1: 2/2 item(s) succeeded',
      '  [x] model  src/model.ts  (1 iteration)',
      '  [x] view  src/view.ts  (1 iteration)',
      `Wrote ${join('src', 'model.ts')}`,
      `Wrote ${join('src', 'view.ts')}`,
    ])
    // The restored result comes from the first run's generator
    expect(await readFile(join(project.root, 'src', 'model.ts'), 'utf-8')).toBe('// 1\n')
    expect(await readFile(join(project.root, 'src', 'view.ts'), 'utf-8')).toBe('// 1\n')
  })

  it('exits 2 for an unknown run id', async () => {
    const exitCode = await runResumeAction({ ...baseOptions(), runId: 'missing', capabilities: fakeCapabilities() })

    expect(exitCode).toBe(RUN_EXIT_USAGE)
    expect(output.getStderr()).toBe('Error: No run found matching "missing"\n')
  })
})
