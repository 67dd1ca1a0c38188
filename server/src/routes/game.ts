import { Router } from 'express';
import type { GameSession } from '../services/gameSession';

export function createGameRouter(session: GameSession) {
  const router = Router();

  // GET /game -> current board, roster and turn
  router.get('/game', async (_req, res) => {
    try {
      res.json(await session.snapshot());
    } catch (err) {
      console.error('[game] snapshot error', err);
      res.status(500).json({ error: 'game_snapshot_error' });
    }
  });

  return router;
}
