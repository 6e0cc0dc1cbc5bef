// src/server.ts
import http from 'http';
import { Server as SocketIOServer } from 'socket.io';
import { loadConfig, AppConfig } from './config/env';
import { connectDB, disconnectDB } from './config/db';
import { createApp, corsOptionsFor } from './app';
import { DocumentStore } from './services/documentStore';
import { MongoCollectionDriver } from './services/drivers/mongo.driver';
import { SessionTokenManager } from './services/token.service';
import { PasswordHasher } from './utils/passwordHasher';
import { ConnectionRegistry } from './sockets/connectionRegistry';
import { BroadcastDispatcher } from './sockets/broadcastDispatcher';
import { GatewayServer, RealtimeGateway } from './sockets/realtimeGateway';
import { USERS_COLLECTION } from './models/User';
import { ITEMS_COLLECTION } from './models/Item';
import { errorMessage } from './utils/errors';
import {
  ClientToServerEvents,
  InterServerEvents,
  ServerToClientEvents,
  SocketData
} from './types/socket.types';

const start = async (config: AppConfig): Promise<void> => {
  await connectDB(config.mongoURI);

  const driver = new MongoCollectionDriver();
  await driver.ensureUniqueIndex(USERS_COLLECTION, ['username']);
  await driver.ensureUniqueIndex(ITEMS_COLLECTION, ['owner', 'title']);

  const tokens = new SessionTokenManager({ secret: config.jwtSecret, ttlSeconds: config.tokenTtlSeconds });
  const registry = new ConnectionRegistry({ closeGraceMs: config.logoutGraceMs });
  const dispatcher = new BroadcastDispatcher(registry);

  const app = createApp({
    store: new DocumentStore(driver),
    tokens,
    hasher: new PasswordHasher(config.hash),
    registry,
    dispatcher,
    allowedOrigins: config.allowedOrigins
  });

  // --- Server and Socket.IO Setup ---
  const server = http.createServer(app);
  const io: GatewayServer = new SocketIOServer<ClientToServerEvents, ServerToClientEvents, InterServerEvents, SocketData>(server, {
    cors: corsOptionsFor(config.allowedOrigins),
    path: '/socket.io/'
  });

  const gateway = new RealtimeGateway({
    tokens,
    registry,
    dispatcher,
    notificationIntervalMs: config.notificationIntervalMs,
    handshakeTimeoutMs: config.handshakeTimeoutMs
  });
  gateway.attach(io);

  server.listen(config.port, () => {
    console.log(`🚀 Server running on port ${config.port}`);
    console.log(`📍 Environment: ${process.env.NODE_ENV || 'development'}`);
  });

  const shutdown = (signal: string): void => {
    console.log(`${signal} received, shutting down`);
    gateway.shutdown();
    io.close(() => {
      disconnectDB()
        .then(() => process.exit(0))
        .catch(err => {
          console.error('Error closing the database connection:', errorMessage(err));
          process.exit(1);
        });
    });
  };

  process.on('SIGINT', () => shutdown('SIGINT'));
  process.on('SIGTERM', () => shutdown('SIGTERM'));
};

if (require.main === module) {
  let config: AppConfig;
  try {
    config = loadConfig();
  } catch (err) {
    console.error('FATAL ERROR:', errorMessage(err));
    process.exit(1);
  }

  start(config).catch(err => {
    console.error('Failed to start the server:', errorMessage(err));
    process.exit(1);
  });
}
