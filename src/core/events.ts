import { EventEmitter } from 'eventemitter3';
import type {
  ContainerPhase,
  InteractionEvent,
  LifecycleOperation,
  Prediction,
} from '../container/types.js';
import type { ContainerError, ObservationError } from './errors.js';

export interface ContainerEvents {
  'phase:changed': { from: ContainerPhase; to: ContainerPhase };
  'operation:started': { operation: LifecycleOperation };
  'operation:completed': { operation: LifecycleOperation; success: boolean };
  'event:ignored': { event: InteractionEvent };
  'event:stored': { event: InteractionEvent };
  'event:failed': { event: InteractionEvent; error: ContainerError };
  'prediction:published': { prediction: Prediction | null };
  'observation:failed': { error: ObservationError };
}

export type ListenerErrorHandler = (event: keyof ContainerEvents, error: unknown) => void;

interface Registration {
  listener: object;
  wrapped: EventEmitter.ListenerFn;
}

export class ContainerEventBus {
  private emitter = new EventEmitter();
  private registrations = new Map<keyof ContainerEvents, Registration[]>();

  constructor(private readonly onListenerError?: ListenerErrorHandler) {}

  on<K extends keyof ContainerEvents>(event: K, listener: (data: ContainerEvents[K]) => void): void {
    this.emitter.on(event, this.wrap(event, listener, false));
  }

  off<K extends keyof ContainerEvents>(event: K, listener: (data: ContainerEvents[K]) => void): void {
    const registrations = this.registrations.get(event) ?? [];
    const index = registrations.findIndex((r) => r.listener === listener);
    if (index === -1) return;
    const [registration] = registrations.splice(index, 1);
    this.emitter.off(event, registration.wrapped);
  }

  once<K extends keyof ContainerEvents>(event: K, listener: (data: ContainerEvents[K]) => void): void {
    this.emitter.once(event, this.wrap(event, listener, true));
  }

  /**
   * Deliver to every listener. A throwing listener is reported to the
   * error handler and the remaining listeners still run.
   */
  emit<K extends keyof ContainerEvents>(event: K, data: ContainerEvents[K]): void {
    this.emitter.emit(event, data);
  }

  listenerCount(event: keyof ContainerEvents): number {
    return this.emitter.listenerCount(event);
  }

  removeAllListeners(): void {
    this.emitter.removeAllListeners();
    this.registrations.clear();
  }

  private wrap<K extends keyof ContainerEvents>(
    event: K,
    listener: (data: ContainerEvents[K]) => void,
    once: boolean,
  ): EventEmitter.ListenerFn {
    const wrapped = (data: ContainerEvents[K]): void => {
      if (once) this.forget(event, wrapped);
      try {
        listener(data);
      } catch (err) {
        this.onListenerError?.(event, err);
      }
    };

    const registrations = this.registrations.get(event) ?? [];
    registrations.push({ listener, wrapped });
    this.registrations.set(event, registrations);
    return wrapped;
  }

  private forget(event: keyof ContainerEvents, wrapped: EventEmitter.ListenerFn): void {
    const registrations = this.registrations.get(event);
    if (!registrations) return;
    const index = registrations.findIndex((r) => r.wrapped === wrapped);
    if (index !== -1) registrations.splice(index, 1);
  }
}
