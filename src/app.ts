//  src/app.ts
import express, { Express, Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { AuthService } from './services/auth.service';
import { DocumentStore } from './services/documentStore';
import { SessionTokenManager } from './services/token.service';
import { PasswordHasher } from './utils/passwordHasher';
import { ConnectionRegistry } from './sockets/connectionRegistry';
import { BroadcastDispatcher } from './sockets/broadcastDispatcher';
import { createAuthMiddleware } from './middlewares/auth.middleware';
import { createAuthRouter } from './routes/auth.routes';
import { createItemRouter } from './routes/item.routes';
import { createPhotoRouter } from './routes/photo.routes';
import { USERS_COLLECTION } from './models/User';
import { ITEMS_COLLECTION } from './models/Item';
import { PHOTOS_COLLECTION } from './models/Photo';

export interface AppDependencies {
  store: DocumentStore;
  tokens: SessionTokenManager;
  hasher: PasswordHasher;
  registry: ConnectionRegistry;
  dispatcher: BroadcastDispatcher;
  allowedOrigins?: string[];
}

export const corsOptionsFor = (allowedOrigins: string[]): cors.CorsOptions => ({
  origin: allowedOrigins,
  methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
  credentials: true
});

export const createApp = (deps: AppDependencies): Express => {
  const app = express();
  const corsOptions = corsOptionsFor(deps.allowedOrigins ?? ['http://localhost:3000']);

  app.options('*', cors(corsOptions));
  app.use(cors(corsOptions));
  app.use(express.json());

  if (process.env.NODE_ENV === 'development') {
    app.use((req, res, next) => {
      if (req.path.startsWith('/api')) {
        console.log(`${req.method} ${req.path}`);
      }
      next();
    });
  }

  const auth = new AuthService({
    users: deps.store.collection(USERS_COLLECTION),
    hasher: deps.hasher,
    tokens: deps.tokens,
    registry: deps.registry
  });
  const authMiddleware = createAuthMiddleware(deps.tokens);

  // --- API ROUTES ---
  app.get('/api/ping', (req, res) => {
    res.json({ message: 'pong' });
  });
  app.use('/api/auth', createAuthRouter(auth, authMiddleware));
  app.use(
    '/api/items',
    createItemRouter({ items: deps.store.collection(ITEMS_COLLECTION), dispatcher: deps.dispatcher }, authMiddleware)
  );
  app.use('/api/photos', createPhotoRouter(deps.store.collection(PHOTOS_COLLECTION), authMiddleware));

  // --- 404 and Error Handlers ---
  app.use('*', (req, res) => {
    res.status(404).json({ message: 'Route not found', path: req.originalUrl });
  });

  app.use((err: Error, req: Request, res: Response, next: NextFunction) => {
    console.error(err.stack);
    res.status(500).json({ message: 'Server Error', error: err.message });
  });

  return app;
};

export default createApp;
