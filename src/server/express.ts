/**
 * Express REST API Server
 * Serves the status route and the single example resource
 */

import express, {
  type Express,
  type Request,
  type Response,
  type NextFunction,
} from 'express';
import cors from 'cors';
import { createServer, type Server as HttpServer } from 'http';
import { getResourceStore, type ResourceStore, type StoreResult } from '../storage/resource-store.js';
import {
  STATUS_BODY,
  type ErrorBody,
  type QueryExtras,
  type ResourceWithExtras,
} from '../types/index.js';
import {
  RequestError,
  fromBodyParserError,
  notFound,
  notJson,
  unsupportedMethod,
} from '../types/errors.js';

// ============================================
// Types
// ============================================

export interface ServerConfig {
  port: number;
  host: string;
  corsOrigins: string | string[];
  logRequests: boolean;
}

export const DEFAULT_SERVER_CONFIG: ServerConfig = {
  port: 5000,
  host: 'localhost',
  corsOrigins: '*',
  logRequests: false,
};

export const RESOURCE_PATH = '/test_resource';

// ============================================
// API Server
// ============================================

export class ApiServer {
  private app: Express;
  private server: HttpServer;
  private config: ServerConfig;
  private store: ResourceStore;

  constructor(config: Partial<ServerConfig> = {}, store: ResourceStore = getResourceStore()) {
    this.config = {
      ...DEFAULT_SERVER_CONFIG,
      ...config,
    };
    this.store = store;

    this.app = express();
    this.server = createServer(this.app);

    this.setupMiddleware();
    this.setupRoutes();
    this.setupErrorHandling();
  }

  // ----------------------------------------
  // Helpers
  // ----------------------------------------

  /** First value of a query param, or null when absent */
  private getQueryAsString(query: unknown): string | null {
    if (typeof query === 'string') return query;
    if (Array.isArray(query) && typeof query[0] === 'string') return query[0];
    return null;
  }

  private sendResult(res: Response, result: StoreResult, successStatus = 200): void {
    if (result.ok) {
      res.status(successStatus).json(result.resource);
    } else {
      this.sendError(res, result.error);
    }
  }

  /** PUT and POST only take bodies declared as JSON */
  private requireJsonBody(req: Request): unknown {
    if (!req.is('application/json')) {
      throw notJson();
    }
    return req.body;
  }

  private sendError(res: Response, error: RequestError): void {
    res.status(error.status).json(error.toJSON());
  }

  // ----------------------------------------
  // Middleware
  // ----------------------------------------

  private setupMiddleware(): void {
    if (this.config.logRequests) {
      this.app.use((req: Request, res: Response, next: NextFunction) => {
        const startedAt = Date.now();
        res.on('finish', () => {
          console.log(`${req.method} ${req.originalUrl} -> ${res.statusCode} (${Date.now() - startedAt}ms)`);
        });
        next();
      });
    }

    this.app.use(cors({
      origin: this.config.corsOrigins,
    }));
    // Scalars are let through to the store's object check
    this.app.use(express.json({ strict: false }));
  }

  // ----------------------------------------
  // Routes
  // ----------------------------------------

  private setupRoutes(): void {
    // Status check
    this.app.get('/', (_req: Request, res: Response) => {
      res.json(STATUS_BODY);
    });

    this.app.route(RESOURCE_PATH)
      // Read, echoing `first` / `second` query params when either is given
      .get((req: Request, res: Response) => {
        const extras: QueryExtras = {
          first: this.getQueryAsString(req.query.first),
          second: this.getQueryAsString(req.query.second),
        };

        const resource = this.store.get();
        if (extras.first === null && extras.second === null) {
          res.json(resource);
          return;
        }

        const body: ResourceWithExtras = { resource, extras };
        res.json(body);
      })

      // Merge a subset of fields into the shared resource
      .put((req: Request, res: Response) => {
        this.sendResult(res, this.store.merge(this.requireJsonBody(req)));
      })

      // Build a new resource from a complete body; shared state untouched
      .post((req: Request, res: Response) => {
        this.sendResult(res, this.store.build(this.requireJsonBody(req)), 201);
      })

      // Acknowledge only
      .delete((_req: Request, res: Response) => {
        res.status(200).end();
      })

      .all((_req: Request, res: Response) => {
        this.sendError(res, unsupportedMethod());
      });

    this.app.use((_req: Request, res: Response) => {
      this.sendError(res, notFound());
    });
  }

  private setupErrorHandling(): void {
    this.app.use((err: unknown, _req: Request, res: Response, next: NextFunction) => {
      if (res.headersSent) {
        next(err);
        return;
      }

      if (err instanceof RequestError) {
        this.sendError(res, err);
        return;
      }

      const bodyError = fromBodyParserError(err);
      if (bodyError) {
        this.sendError(res, bodyError);
        return;
      }

      console.error('Unhandled request error:', err);
      const body: ErrorBody = { error: 'internal server error' };
      res.status(500).json(body);
    });
  }

  // ----------------------------------------
  // Lifecycle
  // ----------------------------------------

  async start(): Promise<void> {
    return new Promise((resolve, reject) => {
      this.server.once('error', reject);
      this.server.listen(this.config.port, this.config.host, () => {
        this.server.off('error', reject);
        console.log(`API server running at http://${this.config.host}:${this.getPort()}`);
        resolve();
      });
    });
  }

  async stop(): Promise<void> {
    if (!this.server.listening) return;

    return new Promise((resolve, reject) => {
      this.server.close((err) => {
        if (err) reject(err);
        else resolve();
      });
    });
  }

  getApp(): Express {
    return this.app;
  }

  /** Bound port once listening, configured port otherwise */
  getPort(): number {
    const address = this.server.address();
    if (address !== null && typeof address === 'object') {
      return address.port;
    }
    return this.config.port;
  }
}
