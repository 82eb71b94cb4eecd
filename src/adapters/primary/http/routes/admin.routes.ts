import { timingSafeEqual } from 'crypto';
import type { FastifyInstance, FastifyReply, FastifyRequest } from 'fastify';
import type { IUserRepository } from '../../../../modules/user/application/ports/IUserRepository';
import type { IScheduleProfileSource } from '../../../../modules/notifications/application/ports/IScheduleProfileSource';
import {
  GrantPremiumUseCase,
  RevokePremiumUseCase,
} from '../../../../modules/user/application/use-cases/ChangePremiumUseCase';
import { UserIdParamsSchema, UserResponseSchema } from '../../../../shared/validation/schemas';
import { systemClock, type Clock } from '../../../../shared/utils/time';
import { mapUserToResponse } from './user.routes';

export const ADMIN_TOKEN_HEADER = 'x-admin-token';

export interface AdminRouteDependencies {
  userRepository: IUserRepository;
  entitlementStore: Pick<IScheduleProfileSource, 'updateEntitlement'>;
  adminApiToken: string;
  clock?: Clock;
}

function tokenMatches(provided: unknown, expected: string): boolean {
  if (typeof provided !== 'string') {
    return false;
  }
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Admin Routes Module
 *
 * - POST /admin/users/:id/premium - Grant premium
 * - DELETE /admin/users/:id/premium - Revoke premium back to the trial-derived state
 *
 * Every route requires the `x-admin-token` header; a missing or wrong token is a 401.
 * Entitlement is written straight to the account store, bypassing trial arithmetic.
 */
export function registerAdminRoutes(server: FastifyInstance, deps: AdminRouteDependencies): void {
  const clock = deps.clock ?? systemClock;

  void server.register(
    async (admin) => {
      admin.addHook('onRequest', async (request: FastifyRequest, reply: FastifyReply) => {
        if (!tokenMatches(request.headers[ADMIN_TOKEN_HEADER], deps.adminApiToken)) {
          return reply.status(401).send({
            error: { code: 'UNAUTHORIZED', message: 'Missing or invalid admin token' },
          });
        }
      });

      admin.post<{
        Params: { id: string };
      }>('/users/:id/premium', async (request, reply) => {
        const params = UserIdParamsSchema.parse(request.params);

        const user = await new GrantPremiumUseCase(
          deps.userRepository,
          deps.entitlementStore,
          clock
        ).execute(params.id);

        return reply.status(200).send(UserResponseSchema.parse(mapUserToResponse(user)));
      });

      admin.delete<{
        Params: { id: string };
      }>('/users/:id/premium', async (request, reply) => {
        const params = UserIdParamsSchema.parse(request.params);

        const user = await new RevokePremiumUseCase(
          deps.userRepository,
          deps.entitlementStore,
          clock
        ).execute(params.id);

        return reply.status(200).send(UserResponseSchema.parse(mapUserToResponse(user)));
      });
    },
    { prefix: '/admin' }
  );
}
