import { Router, Request, Response, NextFunction } from 'express';
import { z } from 'zod';
import { getServices } from '../services/container';
import { ValidationError } from '../utils/errors';

const router = Router();

const chatMessageSchema = z.object({
  session_id: z.string().min(1).max(128).optional(),
  message: z.string().trim().min(1).max(5000),
});

router.post('/message', async (req: Request, res: Response, next: NextFunction) => {
  try {
    const parsed = chatMessageSchema.safeParse(req.body);
    if (!parsed.success) {
      throw new ValidationError(parsed.error.issues.map((i) => i.message).join(', '));
    }

    const result = await getServices().agent.handleMessage(parsed.data);
    res.json(result);
  } catch (error) {
    if (error instanceof ValidationError) {
      return res.status(400).json({ success: false, error: error.message });
    }
    next(error);
  }
});

router.delete('/sessions/:sessionId', async (req: Request, res: Response, next: NextFunction) => {
  try {
    await getServices().agent.resetSession(req.params.sessionId);
    res.json({ success: true });
  } catch (error) {
    next(error);
  }
});

export default router;
