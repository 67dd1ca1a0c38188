import http from 'http';
import express from 'express';
import cors from 'cors';
import { env } from './config/env';
import healthRouter from './routes/health';
import { createGameRouter } from './routes/game';
import { createSocketServer } from './socket/index';
import { createGameSession } from './services/gameSession';
import { createRegistry } from './socket/registry';

const session = createGameSession();
const registry = createRegistry();

const app = express();

app.use(cors({ origin: env.corsOrigin }));
app.use(express.json());

app.use('/', healthRouter);
app.use('/', createGameRouter(session));

const server = http.createServer(app);
const io = createSocketServer(server, session, registry);

function start() {
  server.listen(env.port, env.host, () => {
    console.log(`[server] listening on ${env.host}:${env.port}`);
  });
}

start();

export { app, server, io, session, registry };
