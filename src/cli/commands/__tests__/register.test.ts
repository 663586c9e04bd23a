/**
 * Tests for command registration on the Commander program
 */

import { describe, it, expect } from 'vitest'
import { Command } from 'commander'
import { registerConfigCommand } from '../config.js'
import { registerResumeCommand } from '../resume.js'
import { registerRunCommand } from '../run.js'
import { registerStatusCommand } from '../status.js'

function projectRootDefault(program: Command, name: string): unknown {
  const command = program.commands.find((c) => c.name() === name)
  return command?.options.find((o) => o.long === '--project-root')?.defaultValue
}

describe('command registration', () => {
  it('uses the given project root as the --project-root default', () => {
    const program = new Command()
    registerRunCommand(program, '/work/app')
    registerResumeCommand(program, '/work/app')
    registerStatusCommand(program, '/work/app')

    expect(program.commands.map((c) => c.name())).toEqual(['run', 'resume', 'status'])
    expect(projectRootDefault(program, 'run')).toBe('/work/app')
    expect(projectRootDefault(program, 'resume')).toBe('/work/app')
    expect(projectRootDefault(program, 'status')).toBe('/work/app')
  })

  it('registers config with show and get subcommands', () => {
    const program = new Command()
    registerConfigCommand(program, '/work/app')

    const config = program.commands.find((c) => c.name() === 'config')
    expect(config?.commands.map((c) => c.name())).toEqual(['show', 'get'])
  })
})
