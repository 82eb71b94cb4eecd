import type { FastifyInstance } from 'fastify';
import type { IUserRepository } from '../../../../modules/user/application/ports/IUserRepository';
import type { User } from '../../../../modules/user/domain/entities/User';
import type { NotificationSettings } from '../../../../modules/user/application/types/NotificationSettings';
import type { SlotTable } from '../../../../modules/notifications/domain/services/SlotTable';
import { RegisterUserUseCase } from '../../../../modules/user/application/use-cases/RegisterUserUseCase';
import { GetUserUseCase } from '../../../../modules/user/application/use-cases/GetUserUseCase';
import { GetNotificationSettingsUseCase } from '../../../../modules/user/application/use-cases/GetNotificationSettingsUseCase';
import { UpdateNotificationSettingsUseCase } from '../../../../modules/user/application/use-cases/UpdateNotificationSettingsUseCase';
import { RecordUserActivityUseCase } from '../../../../modules/user/application/use-cases/RecordUserActivityUseCase';
import { trialEndOf } from '../../../../modules/user/domain/value-objects/EntitlementState';
import {
  NotificationSettingsResponse,
  NotificationSettingsResponseSchema,
  RegisterUserSchema,
  UpdateNotificationSettingsSchema,
  UserIdParamsSchema,
  UserResponse,
  UserResponseSchema,
} from '../../../../shared/validation/schemas';
import { systemClock, toStorageTimestamp, type Clock } from '../../../../shared/utils/time';

/**
 * User Routes Module
 *
 * - POST /users - Complete registration and start the trial
 * - GET /users/:id - Retrieve user by ID
 * - GET /users/:id/notification-settings - Settings command, read side
 * - PUT /users/:id/notification-settings - Settings command, write side
 * - POST /users/:id/activity - Record an interaction (holds reminders back briefly)
 *
 * **Architecture:**
 * This is a Primary Adapter that:
 * 1. Validates requests using Zod schemas
 * 2. Instantiates use cases with dependencies
 * 3. Calls use case execute() methods
 * 4. Maps domain entities to HTTP responses
 */

export interface UserRouteDependencies {
  userRepository: IUserRepository;
  slotTable: SlotTable;
  trialDurationDays: number;
  clock?: Clock;
}

/**
 * Map User domain entity to UserResponse DTO
 */
export function mapUserToResponse(user: User): UserResponse {
  const trialEndsAt = trialEndOf(user.entitlement);
  return {
    id: user.id,
    chatId: user.chatId,
    fullName: user.fullName,
    utcOffset: user.effectiveUtcOffset.toString(),
    notificationFrequency: user.notificationFrequency,
    entitlement: user.entitlement.kind,
    trialEndsAt: trialEndsAt === null ? null : toStorageTimestamp(trialEndsAt),
    createdAt: toStorageTimestamp(user.createdAt),
    updatedAt: toStorageTimestamp(user.updatedAt),
  };
}

function mapSettingsToResponse(settings: NotificationSettings): NotificationSettingsResponse {
  return {
    ...settings,
    utcOffset: settings.utcOffset.toString(),
  };
}

/**
 * Register user routes on Fastify server
 */
export function registerUserRoutes(server: FastifyInstance, deps: UserRouteDependencies): void {
  const clock = deps.clock ?? systemClock;

  /**
   * POST /users - Complete registration
   *
   * **Response Codes:**
   * - 201: User registered, trial started
   * - 400: Invalid input (validation failed)
   * - 409: Chat id already registered
   */
  server.post<{
    Body: unknown;
  }>('/users', async (request, reply) => {
    const body = RegisterUserSchema.parse(request.body);

    const registerUserUseCase = new RegisterUserUseCase(
      deps.userRepository,
      { trialDurationDays: deps.trialDurationDays },
      clock
    );
    const user = await registerUserUseCase.execute(body);

    return reply.status(201).send(UserResponseSchema.parse(mapUserToResponse(user)));
  });

  /**
   * GET /users/:id - Retrieve a user by ID
   *
   * **Response Codes:**
   * - 200: User found and returned
   * - 400: Invalid UUID format
   * - 404: User not found
   */
  server.get<{
    Params: { id: string };
  }>('/users/:id', async (request, reply) => {
    const params = UserIdParamsSchema.parse(request.params);

    const user = await new GetUserUseCase(deps.userRepository).execute(params.id);

    return reply.status(200).send(UserResponseSchema.parse(mapUserToResponse(user)));
  });

  server.get<{
    Params: { id: string };
  }>('/users/:id/notification-settings', async (request, reply) => {
    const params = UserIdParamsSchema.parse(request.params);

    const settings = await new GetNotificationSettingsUseCase(
      deps.userRepository,
      deps.slotTable,
      clock
    ).execute(params.id);

    return reply
      .status(200)
      .send(NotificationSettingsResponseSchema.parse(mapSettingsToResponse(settings)));
  });

  /**
   * PUT /users/:id/notification-settings - Change frequency and/or offset
   *
   * Takes effect on the scheduler's next tick. Responds with the new settings.
   */
  server.put<{
    Params: { id: string };
    Body: unknown;
  }>('/users/:id/notification-settings', async (request, reply) => {
    const params = UserIdParamsSchema.parse(request.params);
    const body = UpdateNotificationSettingsSchema.parse(request.body);

    await new UpdateNotificationSettingsUseCase(deps.userRepository, clock).execute(params.id, body);
    const settings = await new GetNotificationSettingsUseCase(
      deps.userRepository,
      deps.slotTable,
      clock
    ).execute(params.id);

    return reply
      .status(200)
      .send(NotificationSettingsResponseSchema.parse(mapSettingsToResponse(settings)));
  });

  server.post<{
    Params: { id: string };
  }>('/users/:id/activity', async (request, reply) => {
    const params = UserIdParamsSchema.parse(request.params);

    await new RecordUserActivityUseCase(deps.userRepository, clock).execute(params.id);

    return reply.status(204).send();
  });
}
