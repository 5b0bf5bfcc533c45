import asyncMqtt from "async-mqtt";
import type { AsyncMqttClient } from "async-mqtt";
import lodash from "lodash";
import { errorMessage } from "./errors.js";
import type { Logger } from "./logger.js";
import type { OutgoingMessage } from "./models.js";

const { connectAsync } = asyncMqtt;
const { chunk } = lodash;

/**
 * Publish-only view of the broker used by the bridge. Both calls reject when
 * the broker cannot be reached.
 */
export interface Transport {
  publishSingle(topic: string, payload: string, options?: { retain?: boolean }): Promise<void>;
  publishMultiple(messages: OutgoingMessage[]): Promise<void>;
}

export interface PublisherOptions {
  host: string;
  port: number;
  useTls?: boolean;
  clientId?: string;
  username?: string;
  password?: string;
  chunkSize?: number;
  logger: Logger;
}

export class Publisher implements Transport {

  private client: AsyncMqttClient | undefined;

  private readonly url: string;

  private readonly chunkSize: number;

  constructor(private readonly options: PublisherOptions) {
    this.url = `${options.useTls ? "mqtts" : "mqtt"}://${options.host}:${options.port}`;
    this.chunkSize = Math.max(1, options.chunkSize ?? 20);
  }

  private async getClient() {
    if (this.client) {
      if (!this.client.connected) {
        this.client.reconnect();
      }
      return this.client;
    }
    this.client = await connectAsync(this.url, {
      clientId: this.options.clientId,
      username: this.options.username,
      password: this.options.password,
      keepalive: 10,
      // Publishing while disconnected must fail instead of waiting for the broker.
      queueQoSZero: false,
    });
    this.client.on("error", (e: Error) => {
      this.options.logger.warn(`MQTT connection error: ${errorMessage(e)}`);
    });
    return this.client;
  }

  async publishSingle(topic: string, payload: string, options?: { retain?: boolean }) {
    await (await this.getClient()).publish(topic, payload, { retain: options?.retain ?? false });
  }

  async publishMultiple(messages: OutgoingMessage[]) {
    const client = await this.getClient();
    for (const c of chunk(messages, this.chunkSize)) {
      await Promise.all(
        c.map(async ({ topic, payload, retain }) => {
          await client.publish(topic, payload, { retain: retain ?? false });
        }),
      );
    }
  }

  async end() {
    if (this.client) {
      const client = this.client;
      this.client = undefined;
      await client.end(!client.connected);
    }
  }
}
