import { Injectable, Logger } from '@nestjs/common';
import { OnEvent } from '@nestjs/event-emitter';
import { STRONG_SIGNAL_EVENT, StrongSignalEvent } from './scanner.types';

const MAX_ALERTS = 50;

@Injectable()
export class SignalAlertService {
  private readonly logger = new Logger(SignalAlertService.name);
  private readonly alerts: StrongSignalEvent[] = []; // newest first

  @OnEvent(STRONG_SIGNAL_EVENT)
  handleStrongSignal(event: StrongSignalEvent): void {
    this.alerts.unshift(event);
    if (this.alerts.length > MAX_ALERTS) {
      this.alerts.length = MAX_ALERTS;
    }

    this.logger.log(this.formatAlert(event));
  }

  getRecentAlerts(limit: number = 10): StrongSignalEvent[] {
    return this.alerts.slice(0, limit);
  }

  formatAlert(event: StrongSignalEvent): string {
    return `STRONG ${event.signal} ${event.symbol} (${event.confidence.toFixed(1)}% confidence)`;
  }
}
