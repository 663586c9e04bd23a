/**
 * Service lifecycle and registry.
 *
 * Long-lived resources (the checkpoint database) implement BaseService and
 * are registered by the CLI runtime, which initializes them in order and
 * shuts them down in reverse when a command finishes.
 */

import { createLogger } from '../utils/logger.js'

const logger = createLogger('services')

// ---------------------------------------------------------------------------
// BaseService interface
// ---------------------------------------------------------------------------

/**
 * Lifecycle interface for resources owned by a runtime.
 */
export interface BaseService {
  /** Open connections; called once, in registration order */
  initialize(): Promise<void>

  /** Release resources; called in reverse registration order */
  shutdown(): Promise<void>
}

// ---------------------------------------------------------------------------
// ServiceRegistry
// ---------------------------------------------------------------------------

/**
 * Named services with ordered startup and reverse-ordered shutdown.
 *
 * @example
 * const registry = new ServiceRegistry()
 * registry.register('database', createCheckpointDatabase(path))
 * await registry.initializeAll()
 * // ...
 * await registry.shutdownAll()
 */
export class ServiceRegistry {
  private readonly _services = new Map<string, BaseService>()
  /** Names of initialized services, in initialization order */
  private _started: string[] = []

  /**
   * @throws {Error} if a service with the same name is already registered.
   */
  register(name: string, service: BaseService): void {
    if (this._services.has(name)) {
      throw new Error(`Service "${name}" is already registered`)
    }
    this._services.set(name, service)
  }

  /**
   * Initialize services in registration order. When one fails, the services
   * started before it are shut down again and the failure is rethrown.
   */
  async initializeAll(): Promise<void> {
    for (const [name, service] of this._services) {
      if (this._started.includes(name)) continue
      try {
        await service.initialize()
      } catch (err) {
        logger.error({ service: name, err }, 'Service initialization failed, shutting down started services')
        try {
          await this.shutdownAll()
        } catch (shutdownErr) {
          logger.error({ err: shutdownErr }, 'Error during cleanup after failed initialization')
        }
        throw err
      }
      this._started.push(name)
    }
  }

  /**
   * Shut down every started service in reverse order. Errors are collected
   * and rethrown as an AggregateError once all services have been visited.
   */
  async shutdownAll(): Promise<void> {
    const errors: Error[] = []
    const started = this._started
    this._started = []

    for (const name of [...started].reverse()) {
      const service = this._services.get(name)
      if (service === undefined) continue
      try {
        await service.shutdown()
      } catch (err) {
        errors.push(err instanceof Error ? err : new Error(String(err)))
      }
    }

    if (errors.length > 0) {
      throw new AggregateError(errors, `Shutdown errors in ${String(errors.length)} service(s)`)
    }
  }
}
