import type { Request, Response } from 'express';
import { env } from '../config/env.js';
import { AppError, UpstreamError } from '../middleware/errorHandler.js';
import { paginate } from '../pipeline/pagination.js';
import { federationService } from '../services/federation.service.js';
import { identityService } from '../services/identity.service.js';
import { instancesService } from '../services/instances.service.js';
import { votesService } from '../services/votes.service.js';
import { parseQuery, schemas } from '../utils/validation.js';
import { ObjectKind, type VotesPage } from '../types/index.js';

/** Upstream must know the object before we report on it. */
async function ensureResolvableUpstream(url: string, kind: ObjectKind): Promise<void> {
  if (!(await instancesService.isAllowedUrl(url))) {
    throw new AppError(422, 'INVALID_INSTANCE', "Not a valid Lemmy URL or url doesn't start with https://");
  }

  if (!env.UPSTREAM_VALIDATION_ENABLED) return;

  const resolved = await federationService.resolveObject(url);
  if (resolved.ok) return;

  if (env.INVALIDATE_IDENTITY_ON_UPSTREAM_MISS) {
    identityService.invalidate(url, kind);
  }
  throw new UpstreamError(
    resolved.status,
    `${resolved.error ?? 'External API Error'}. Make sure you are passing Activity Pub link.`,
  );
}

/** Aborts once the client goes away before the response is written. */
function abortOnDisconnect(res: Response): AbortController {
  const controller = new AbortController();
  res.on('close', () => {
    if (!res.writableEnded) {
      controller.abort(new AppError(499, 'CLIENT_CLOSED_REQUEST', 'Client closed the request'));
    }
  });
  return controller;
}

async function respondWithVotes(kind: ObjectKind, req: Request, res: Response) {
  const params = parseQuery(schemas.votesQuery, req.query);

  await ensureResolvableUpstream(params.url, kind);

  const controller = abortOnDisconnect(res);
  const { aggregate, votes } = await votesService.getVotes({
    url: params.url,
    kind,
    filter: params.votes_filter,
    sort: params.sort_by,
    username: params.username,
    signal: controller.signal,
  });

  const { page, nextOffset } = paginate(votes, params.offset, params.limit);
  const data: VotesPage = {
    votes: page,
    totalCount: votes.length,
    nextOffset,
    totalScore: aggregate.totalScore,
    upvotes: aggregate.upvotes,
    downvotes: aggregate.downvotes,
  };

  res.json({ success: true, data });
}

export const votesController = {
  async getPostVotes(req: Request, res: Response) {
    await respondWithVotes(ObjectKind.Post, req, res);
  },

  async getCommentVotes(req: Request, res: Response) {
    await respondWithVotes(ObjectKind.Comment, req, res);
  },
};
