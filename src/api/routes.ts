import { FastifyInstance } from 'fastify';
import { ContextEngineService, Interaction } from '../engine/context-engine-service';
import { ConversationFragment } from '../store/types';
import { ContextItem } from '../scoring/relevance-scorer';
import {
  contextSchema,
  historySchema,
  interactionSchema,
  linkSchema,
  profileSchema,
  resolveSchema,
  searchSchema,
} from './schemas';

interface ResolveBody {
  phone?: string;
  email?: string;
  name?: string;
  threshold?: number;
}

interface LinkBody {
  identifierA: string;
  identifierB: string;
  displayName?: string;
}

interface ContextBody {
  customerId: string;
  text: string;
  channel: string;
  maxItems?: number;
  windowDays?: number;
}

interface SearchBody {
  text: string;
  customerId?: string;
  k?: number;
  minSimilarity?: number;
}

interface CustomerParams {
  customerId: string;
}

export type PublicFragment = Omit<ConversationFragment, 'embedding'>;

/** Embeddings stay server-side */
export function publicFragment(fragment: ConversationFragment): PublicFragment {
  const { embedding: _embedding, ...rest } = fragment;
  return rest;
}

function publicItem(item: ContextItem): Omit<ContextItem, 'fragment'> & { fragment: PublicFragment } {
  return { ...item, fragment: publicFragment(item.fragment) };
}

export function registerEngineRoutes(app: FastifyInstance, service: ContextEngineService): void {
  app.post<{ Body: ResolveBody }>('/identity/resolve', { schema: resolveSchema }, async (req, reply) => {
    const { phone, email, name, threshold } = req.body;
    return reply.send(await service.resolveIdentity(phone, email, name, threshold));
  });

  app.post<{ Body: LinkBody }>('/identity/link', { schema: linkSchema }, async (req, reply) => {
    const { identifierA, identifierB, displayName } = req.body;
    return reply.send(await service.linkIdentities(identifierA, identifierB, displayName));
  });

  /** 202 when stored, 503 when a store refused the write */
  app.post<{ Body: Interaction }>('/interactions', { schema: interactionSchema }, async (req, reply) => {
    const result = await service.ingestInteraction(req.body);
    if (result.stored) return reply.status(202).send(result);
    return reply.status(result.reason === 'invalid_timestamp' ? 400 : 503).send(result);
  });

  app.post<{ Body: ContextBody }>('/context', { schema: contextSchema }, async (req, reply) => {
    const { customerId, text, channel, maxItems, windowDays } = req.body;

    // A client that hangs up stops waiting on the shared profile rebuild
    const controller = new AbortController();
    const onClose = () => {
      if (!reply.raw.writableFinished) controller.abort();
    };
    reply.raw.once('close', onClose);

    const summary = await service.getContext(customerId, text, channel, {
      maxItems,
      windowDays,
      signal: controller.signal,
    });
    reply.raw.removeListener('close', onClose);

    return reply.send({ ...summary, relevantHistory: summary.relevantHistory.map(publicItem) });
  });

  app.get<{ Params: CustomerParams; Querystring: { forceRebuild?: boolean } }>(
    '/customers/:customerId/profile',
    { schema: profileSchema },
    async (req, reply) => {
      const profile = await service.getCustomerProfile(req.params.customerId, req.query.forceRebuild ?? false);
      return reply.send(profile);
    },
  );

  app.get<{ Params: CustomerParams; Querystring: { limit?: number } }>(
    '/customers/:customerId/history',
    { schema: historySchema },
    async (req, reply) => {
      const history = await service.getConversationHistory(req.params.customerId, req.query.limit);
      return reply.send({ fragments: history.fragments.map(publicFragment), degraded: history.degraded });
    },
  );

  app.post<{ Body: SearchBody }>('/search', { schema: searchSchema }, async (req, reply) => {
    const { text, customerId, k, minSimilarity } = req.body;
    const found = await service.searchSimilar(text, customerId, k, minSimilarity);
    return reply.send({
      results: found.results.map(({ fragment, similarity }) => ({ fragment: publicFragment(fragment), similarity })),
      degraded: found.degraded,
    });
  });
}
