export { createApplication } from './app';
export type { Application, ApplicationOverrides } from './app';
export { loadConfig } from './shared/config/env';
export type { AppConfig } from './shared/config/env';
export { NotificationScheduler, SchedulerState } from './adapters/primary/scheduler/NotificationScheduler';
export { RunNotificationTickUseCase } from './modules/notifications/application/use-cases/RunNotificationTickUseCase';
export type { TickResult } from './modules/notifications/application/types/TickResult';
export type { IDeliverySink, DeliveryOutcome } from './modules/notifications/application/ports/IDeliverySink';
export type { NotificationEvent } from './modules/notifications/application/types/NotificationEvent';
export { SlotTable } from './modules/notifications/domain/services/SlotTable';
export { UtcOffset } from './shared/value-objects/UtcOffset';
export { TimeOfDay } from './shared/value-objects/TimeOfDay';
