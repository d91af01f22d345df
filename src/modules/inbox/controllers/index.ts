import { WebhookController } from './webhook.controller';
import { MessagesController } from './messages.controller';
import { StatsController } from './stats.controller';
import { HealthController } from './health.controller';
import { MetricsController } from './metrics.controller';

export {
  WebhookController,
  MessagesController,
  StatsController,
  HealthController,
  MetricsController,
};

export const INBOX_CONTROLLERS = [
  WebhookController,
  MessagesController,
  StatsController,
  HealthController,
  MetricsController,
];
