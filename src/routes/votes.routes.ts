import { Router } from 'express';
import { votesController } from '../controllers/votes.controller.js';
import { rateLimitGet } from '../middleware/rateLimiter.js';
import { asyncHandler } from '../utils/asyncHandler.js';

const router = Router();

router.get('/post', rateLimitGet, asyncHandler(votesController.getPostVotes));
router.get('/comment', rateLimitGet, asyncHandler(votesController.getCommentVotes));

export default router;
