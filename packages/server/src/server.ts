import type { Server as HttpServer } from 'node:http'
import type { AddressInfo } from 'node:net'
import express from 'express'
import helmet from 'helmet'
import cors from 'cors'
import swaggerUi from 'swagger-ui-express'

import type { DeviceRegistry } from '@plate-designer/devices'
import type { EntityCatalog } from '@plate-designer/home-assistant'
import { makeLogger } from '@plate-designer/logger'
import type { EntityExistenceChecker, ValidationOrchestrator } from '@plate-designer/validation'

import { handleErrors, notFound } from './middlewares/index.js'
import { DevicesRouter, EntitiesRouter, StatusRouter, ValidateRouter } from './routers/index.js'
import { openapiDoc } from './swagger/index.js'

export interface ServerDependencies {
  orchestrator: ValidationOrchestrator
  registry: DeviceRegistry
  checker: EntityExistenceChecker
  catalog: EntityCatalog
}

export interface ListenAddress {
  host: string
  port: number
}

/**
 * Accepts `localhost:8000`, `0.0.0.0:8000` or a full URL such as
 * `http://localhost:8000`. Port 0 asks the OS for a free port.
 */
export function parseDomainWithPort(domainWithPort: string): ListenAddress {
  let host: string
  let port: number

  if (domainWithPort.includes('://')) {
    const url = new URL(domainWithPort)
    host = url.hostname
    port = Number(url.port || 8000)
  } else {
    const [maybeHost, maybePort] = domainWithPort.split(':')
    host = maybeHost || '0.0.0.0'
    port = maybePort ? Number(maybePort) : 8000
  }

  if (!Number.isInteger(port) || port < 0 || port >= 65536) {
    throw new Error(`Invalid port in domainWithPort: "${domainWithPort}" → ${port}`)
  }
  return { host, port }
}

export class Server {
  private readonly app = express()
  private readonly logger = makeLogger('PlateDesignerServer')
  private httpServer?: HttpServer

  constructor(
    private readonly deps: ServerDependencies,
    private readonly domainWithPort: string,
    private readonly allowedOrigins: string[],
  ) {
    this.configureMiddleware()
    this.configureRouters()
  }

  /** Resolves with the bound address once the server is listening. */
  public async start(): Promise<ListenAddress> {
    const { host, port } = parseDomainWithPort(this.domainWithPort)

    return new Promise<ListenAddress>((resolve, reject) => {
      const httpServer = this.app.listen(port, host, () => {
        const address = httpServer.address()
        const bound = isAddressInfo(address) ? address.port : port
        this.logger.info(`API on ${host}:${bound}  |  Docs: http://${host}:${bound}/docs`)
        resolve({ host, port: bound })
      })

      httpServer.on('error', (err) => {
        this.logger.error(`Failed to start server: ${err.message}`)
        reject(err)
      })
      this.httpServer = httpServer
    })
  }

  public async stop(): Promise<void> {
    const httpServer = this.httpServer
    if (!httpServer) return
    this.httpServer = undefined

    await new Promise<void>((resolve, reject) => {
      httpServer.close((err) => (err ? reject(err) : resolve()))
    })
    this.logger.info('server stopped')
  }

  private configureMiddleware(): void {
    this.app.use(cors({ origin: this.allowedOrigins }))
    this.app.use(express.json({ limit: '1mb' }))
    this.app.use(helmet())

    this.app.use('/docs', swaggerUi.serve, swaggerUi.setup(openapiDoc))
  }

  private configureRouters(): void {
    const { orchestrator, registry, checker, catalog } = this.deps

    this.app.use(StatusRouter.basePath, StatusRouter.create())
    this.app.use(DevicesRouter.basePath, DevicesRouter.create(registry))
    this.app.use(EntitiesRouter.basePath, EntitiesRouter.create(catalog, this.logger))
    this.app.use(
      ValidateRouter.basePath,
      ValidateRouter.create(orchestrator, checker, this.logger),
    )

    this.app.use(notFound())
    this.app.use(handleErrors(this.logger))
  }
}

function isAddressInfo(address: string | AddressInfo | null): address is AddressInfo {
  return typeof address === 'object' && address !== null
}
