/**
 * Agent Tool Routes
 *
 * GET  /api/agent/tools    - tool definitions in function-calling format
 * POST /api/agent/execute  - run one tool call, result as parsed JSON
 */

import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { TRAVEL_AGENT_TOOLS, executeToolCall, type ToolExecutionContext } from '../services/agentTools';
import { agentRateLimiter } from '../middleware/rateLimiter';
import { sendValidationError } from './httpErrors';

// Models send arguments as a JSON string; plain objects are accepted too.
const executeSchema = z.object({
  name: z.string().min(1, 'Tool name is required'),
  arguments: z.union([z.string(), z.record(z.unknown())]).default({}),
});

function parseArguments(raw: string | Record<string, unknown>): unknown {
  if (typeof raw !== 'string') return raw;
  try {
    return JSON.parse(raw);
  } catch {
    // Left to the tool's argument schema to reject
    return raw;
  }
}

export function createAgentRouter(context: ToolExecutionContext): Router {
  const router = Router();

  router.get('/tools', (_req: Request, res: Response) => {
    res.json({ tools: TRAVEL_AGENT_TOOLS });
  });

  router.post('/execute', agentRateLimiter, async (req: Request, res: Response) => {
    const validation = executeSchema.safeParse(req.body);
    if (!validation.success) return sendValidationError(res, validation.error);

    const { name } = validation.data;
    const output = await executeToolCall(name, parseArguments(validation.data.arguments), context);
    const result: unknown = JSON.parse(output);
    res.json({ tool: name, result });
  });

  return router;
}
