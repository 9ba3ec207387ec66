import { FastifyPluginAsync } from 'fastify';
import { z } from 'zod';
import { serializeAuthResult, serializeEmployee, serializeSession } from '../serialize.js';

const IdentifierBodySchema = z.object({
  identifier: z.string().trim().min(1).max(128),
});

const PERMISSION_REGEX = /^[a-z_*]{1,64}$/;

const authRoutes: FastifyPluginAsync = async (fastify) => {
  const { authService: auth, directory, kioskLogger: logger } = fastify;

  // Manual login or a card id typed in by hand
  fastify.post('/api/auth/login', async (request, reply) => {
    const body = IdentifierBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: 'Invalid identifier' });
    }

    const result = await auth.authenticate(body.data.identifier);
    const payload = serializeAuthResult(result);
    switch (result.status) {
      case 'success':
        return payload;
      case 'unauthorized':
        return reply.code(401).send({ error: 'Unauthorized', ...payload });
      case 'locked':
        return reply.code(423).send({ error: 'Identifier locked', ...payload });
    }
  });

  fastify.get('/api/auth/me', async (request, reply) => {
    const user = auth.getCurrentUser();
    if (!user) {
      return reply.code(401).send({ error: 'Not logged in' });
    }
    return { employee: serializeEmployee(user), session: serializeSession(auth.sessionInfo()) };
  });

  fastify.post('/api/auth/activity', async () => {
    auth.updateActivity();
    return { authenticated: auth.isAuthenticated() };
  });

  fastify.post('/api/auth/logout', async () => {
    auth.logout();
    return { authenticated: false };
  });

  fastify.get<{
    Params: { permission: string };
  }>('/api/auth/permissions/:permission', async (request, reply) => {
    const { permission } = request.params;
    if (!PERMISSION_REGEX.test(permission)) {
      return reply.code(400).send({ error: 'Invalid permission name' });
    }
    return { permission, granted: auth.hasPermission(permission) };
  });

  fastify.get('/api/auth/stats', async () => {
    return auth.getLoginStatistics();
  });

  fastify.post('/api/auth/unlock', async (request, reply) => {
    const body = IdentifierBodySchema.safeParse(request.body);
    if (!body.success) {
      return reply.code(400).send({ error: 'Invalid identifier' });
    }

    const identifier = body.data.identifier;
    const result = auth.unlockAccount(identifier);
    switch (result) {
      case 'unlocked':
        return { identifier, unlocked: true };
      case 'not_locked':
        return reply.code(404).send({ error: 'Identifier is not locked' });
      case 'forbidden':
        return reply.code(403).send({ error: "Permission 'manage_users' required" });
    }
  });

  fastify.get('/api/auth/manual-identities', async (request, reply) => {
    try {
      return { identities: await directory.listManualIdentities() };
    } catch (err) {
      logger.error({ err }, 'Failed to list manual identities');
      return reply.code(500).send({ error: 'Failed to list manual identities' });
    }
  });
};

export default authRoutes;
