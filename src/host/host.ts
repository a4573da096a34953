import { EventEmitter } from "node:events";
import { createLogger } from "../logger.ts";
import type {
  DeviceState,
  RemoteAttributes,
  RemoteEntity,
} from "./types.ts";

const log = createLogger("host");

/**
 * In-process view of the remote-control host: entities the integration
 * offers, entities the host subscribed to, and the integration's
 * connection state. Changes are published as events, which the web bridge
 * queues for the host to collect from `GET /events`.
 */
export class IntegrationHost extends EventEmitter<{
  deviceStateChanged: [DeviceState];
  entityAttributesChanged: [string, RemoteAttributes];
  entitiesSubscribed: [string[]];
}> {
  private readonly available = new Map<string, RemoteEntity>();
  private readonly configured = new Map<string, RemoteEntity>();
  private state: DeviceState = "DISCONNECTED";

  get deviceState(): DeviceState {
    return this.state;
  }

  setDeviceState = (state: DeviceState): void => {
    if (state === this.state) {
      return;
    }
    log.debug("host.device_state", { from: this.state, to: state });
    this.state = state;
    this.emit("deviceStateChanged", state);
  };

  /**
   * Replaces every available and configured entity
   */
  replaceEntities = (entities: RemoteEntity[]): void => {
    const subscribed = [...this.configured.keys()];
    this.available.clear();
    this.configured.clear();
    entities.forEach(entity => this.available.set(entity.id, entity));

    // keep subscriptions that survived the rebuild
    for (const id of subscribed) {
      const entity = this.available.get(id);
      if (entity) {
        this.configured.set(id, entity);
      }
    }
  };

  availableEntities = (): RemoteEntity[] => [...this.available.values()];

  configuredEntities = (): RemoteEntity[] => [...this.configured.values()];

  getConfigured = (entityId: string): RemoteEntity | undefined =>
    this.configured.get(entityId);

  isConfigured = (entityId: string): boolean => this.configured.has(entityId);

  /**
   * Subscribes the host to available entities. An empty list subscribes to
   * all of them. Returns the ids actually subscribed.
   */
  subscribe = (entityIds: string[]): string[] => {
    const ids = entityIds.length > 0 ? entityIds : [...this.available.keys()];
    const subscribed = ids.flatMap(id => {
      const entity = this.available.get(id);
      if (!entity) {
        log.warn("host.subscribe_unknown", { entityId: id });
        return [];
      }
      this.configured.set(id, entity);
      return [id];
    });

    this.emit("entitiesSubscribed", subscribed);
    return subscribed;
  };

  /**
   * Returns the ids that were subscribed and no longer are
   */
  unsubscribe = (entityIds: string[]): string[] =>
    entityIds.filter(id => this.configured.delete(id));

  updateAttributes = (
    entityId: string,
    attributes: Partial<RemoteAttributes>
  ): boolean => {
    const entity = this.configured.get(entityId);
    if (!entity) {
      return false;
    }

    entity.attributes = { ...entity.attributes, ...attributes };
    this.emit("entityAttributesChanged", entityId, entity.attributes);
    return true;
  };

  clearEntities = (): void => {
    this.available.clear();
    this.configured.clear();
  };
}
