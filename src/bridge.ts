import stringify from "json-stable-stringify-without-jsonify";
import { coerceAttributes } from "./disks/coercion.js";
import { discoveryMessages, expandSensorTemplates } from "./disks/sensors.js";
import type { DiskSensorConfig } from "./disks/sensors.js";
import { BootstrapError, errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import { FIRMWARE_REVISION_ATTRIBUTE, MODEL_ID_ATTRIBUTE } from "./models.js";
import type {
  Availability,
  DiskAttributes,
  DiskIdentity,
  DiskSnapshot,
  SensorTemplate,
} from "./models.js";
import type { Transport } from "./publish.js";
import type { SnapshotSource } from "./sources/base.js";
import { sleep } from "./utils.js";

export type BridgePhase = "idle" | "bootstrapping" | "steady" | "draining" | "terminated";

export interface DiskRuntimeState {
  readonly identity: DiskIdentity;
  readonly config: DiskSensorConfig;
  /**
   * Whether the retained discovery batch reached the broker. A failed batch is
   * retried on the disk's next poll.
   */
  discoveryPublished: boolean;
  lastAvailability: Availability | "unknown";
}

export interface DiskBridgeOptions {
  source: SnapshotSource;
  transport: Transport;
  templates: readonly SensorTemplate[];
  /**
   * Seconds between the start of two polls.
   */
  pollInterval: number;
  baseTopic: string;
  discoveryPrefix?: string;
  logger: Logger;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
}

export function identityFromAttributes(
  serialNumber: string,
  attributes: DiskAttributes,
): DiskIdentity {
  return {
    serialNumber,
    modelId: attributes[MODEL_ID_ATTRIBUTE]?.trim() || "Unknown",
    firmwareRevision: attributes[FIRMWARE_REVISION_ATTRIBUTE]?.trim() || "Unknown",
  };
}

/**
 * Registers every disk of the first snapshot with Home Assistant, then keeps
 * republishing their state and availability until stopped.
 *
 * Disks that show up after the first snapshot are not registered.
 */
export class DiskBridge {
  private readonly states = new Map<string, DiskRuntimeState>();

  private currentPhase: BridgePhase = "idle";

  private readonly wait: (ms: number, signal: AbortSignal) => Promise<void>;

  constructor(private readonly options: DiskBridgeOptions) {
    this.wait = options.sleep ?? sleep;
  }

  get phase(): BridgePhase {
    return this.currentPhase;
  }

  get disks(): ReadonlyMap<string, DiskRuntimeState> {
    return this.states;
  }

  async run(signal: AbortSignal): Promise<void> {
    try {
      await this.bootstrap();
    } catch (e) {
      this.currentPhase = "terminated";
      throw e;
    }

    this.currentPhase = "steady";
    try {
      while (!signal.aborted) {
        const start = Date.now();
        await this.poll();
        if (signal.aborted) {
          break;
        }
        const sleepInterval = this.options.pollInterval * 1000 - (Date.now() - start);
        this.options.logger.debug(`Sleeping for ${sleepInterval}ms...`);
        await this.wait(sleepInterval, signal);
      }
      this.options.logger.log("Exiting main loop");
    } finally {
      await this.drain();
      this.currentPhase = "terminated";
    }
  }

  async bootstrap(): Promise<void> {
    const { source, templates, logger } = this.options;
    this.currentPhase = "bootstrapping";

    logger.log("Getting initial data from hdsentinel...");
    let snapshot: DiskSnapshot;
    try {
      snapshot = await source.snapshot();
    } catch (e) {
      throw new BootstrapError(`Cannot read initial disk data: ${errorMessage(e)}`, { cause: e });
    }
    if (snapshot.size === 0) {
      throw new BootstrapError("No disks found");
    }

    for (const [serialNumber, attributes] of snapshot) {
      try {
        const identity = identityFromAttributes(serialNumber, attributes);
        const config = expandSensorTemplates(identity, templates, {
          pollInterval: this.options.pollInterval,
          baseTopic: this.options.baseTopic,
          discoveryPrefix: this.options.discoveryPrefix,
        });
        const state: DiskRuntimeState = {
          identity,
          config,
          discoveryPublished: false,
          lastAvailability: "unknown",
        };
        this.states.set(serialNumber, state);
        logger.log(`Registered disk ${serialNumber} as ${config.alias}`);
        await this.publishDiscovery(state);
      } catch (e) {
        logger.error(`Error setting up disk ${serialNumber}: ${errorMessage(e)}`);
      }
    }

    if (this.states.size === 0) {
      throw new BootstrapError("None of the disks found could be registered");
    }
  }

  /**
   * One steady-state cycle: take a snapshot and publish state and availability
   * for every registered disk. Never throws.
   */
  async poll(): Promise<void> {
    const { source, transport, logger } = this.options;

    let snapshot: DiskSnapshot;
    try {
      snapshot = await source.snapshot();
    } catch (e) {
      logger.error(`Failed to read disk data, skipping cycle: ${errorMessage(e)}`);
      return;
    }

    for (const serialNumber of snapshot.keys()) {
      if (!this.states.has(serialNumber)) {
        logger.warn(`Skipping new disk ${serialNumber} that wasn't in initial configuration`);
      }
    }

    for (const [serialNumber, state] of this.states) {
      try {
        const attributes = snapshot.get(serialNumber);
        if (attributes === undefined) {
          await this.publishAvailability(state, "offline");
          continue;
        }
        if (!state.discoveryPublished) {
          await this.publishDiscovery(state);
        }
        const payload = stringify(coerceAttributes(attributes, state.config.valueTypes));
        logger.debug(`Publishing state for ${state.config.stateTopic}: ${payload.slice(0, 100)}...`);
        await transport.publishSingle(state.config.stateTopic, payload, { retain: false });
        await this.publishAvailability(state, "online");
      } catch (e) {
        logger.error(`Error processing disk ${serialNumber}: ${errorMessage(e)}`);
      }
    }
  }

  /**
   * Mark every registered disk offline, whatever was published before.
   */
  async drain(): Promise<void> {
    this.currentPhase = "draining";
    for (const [serialNumber, state] of this.states) {
      try {
        await this.publishAvailability(state, "offline", true);
      } catch (e) {
        this.options.logger.error(`Error publishing offline status for ${serialNumber}: ${errorMessage(e)}`);
      }
    }
  }

  private async publishDiscovery(state: DiskRuntimeState): Promise<void> {
    const { transport, logger } = this.options;
    const messages = discoveryMessages(state.config);
    logger.log(`Publishing ${messages.length} sensors for ${state.config.alias}`);
    try {
      await transport.publishMultiple(messages);
      state.discoveryPublished = true;
    } catch (e) {
      logger.error(`Failed to publish sensors for ${state.config.alias}, retrying next poll: ${errorMessage(e)}`);
    }
  }

  private async publishAvailability(
    state: DiskRuntimeState,
    availability: Availability,
    force = false,
  ): Promise<void> {
    if (!force && state.lastAvailability === availability) {
      return;
    }
    this.options.logger.log(`Publishing ${availability} status for ${state.config.alias}`);
    await this.options.transport.publishSingle(state.config.availabilityTopic, availability, {
      retain: true,
    });
    state.lastAvailability = availability;
  }
}
