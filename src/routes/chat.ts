import express from 'express';
import type { AppServices } from '../composition.js';
import type { CarProfile, ChatResponse } from '../types.js';
import { createSessionState } from '../types.js';
import { defaultCarProfile } from '../schemas/carProfile.js';
import { chatBodySchema, historyQuerySchema, type ChatBody } from '../schemas/chat.js';
import { parseInput, validateBody } from '../middleware/validate.js';
import { runAgentSystem } from '../agentLoop.js';
import { getErrorMessage } from '../utils/error-utils.js';

async function loadProfile(services: AppServices, userId: string): Promise<CarProfile> {
  try {
    return await services.profiles.getProfile(userId);
  } catch (err) {
    console.warn(`[Chat] profile load failed for ${userId}, using defaults:`, getErrorMessage(err));
    return defaultCarProfile();
  }
}

async function remember(services: AppServices, result: ChatResponse, profile: CarProfile): Promise<void> {
  try {
    await services.memory.store({
      userId: result.user_id,
      sessionId: result.session_id,
      query: result.query,
      agentTrace: result.agent_trace,
      finalOutput: result,
      carProfileSnapshot: result.car_profile ?? profile,
    });
  } catch (err) {
    console.warn(`[Chat] memory store failed for ${result.user_id}:`, getErrorMessage(err));
  }
}

export function createChatRouter(services: AppServices) {
  const router = express.Router();

  router.post('/', validateBody(chatBodySchema), async (req, res, next) => {
    try {
      const body: ChatBody = req.body;
      const cookieSession: unknown = req.cookies?.sessionId;
      const sessionId = body.session_id
        ?? (typeof cookieSession === 'string' && cookieSession ? cookieSession : 'default');

      console.log(`[Chat] ${body.user_id}/${sessionId}: ${body.query.slice(0, 80)}`);
      const carProfile = await loadProfile(services, body.user_id);
      const state = createSessionState({ query: body.query, userId: body.user_id, sessionId, carProfile });
      const result = await runAgentSystem(state, services.agent);
      await remember(services, result, carProfile);
      res.json(result);
    } catch (err) {
      next(err);
    }
  });

  router.get('/history', async (req, res, next) => {
    try {
      const { user_id, session_id } = parseInput(historyQuerySchema, req.query);
      const memories = await services.memory.forSession(user_id, session_id);
      res.json({ user_id, session_id, count: memories.length, memories });
    } catch (err) {
      next(err);
    }
  });

  return router;
}
