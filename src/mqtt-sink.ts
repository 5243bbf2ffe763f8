import mqtt, { IClientOptions, MqttClient } from 'mqtt';
import { encodeFrame } from './encoding';
import { FrameSink } from './sink';
import { LightbarFrame } from './types';

export interface MqttSinkOptions {
  username?: string;
  password?: string;
  clientId?: string;
}

/**
 * Mirrors every frame to `<baseTopic>/frame` as a retained QoS 0 message.
 * Frames are dropped while the broker is unreachable; mqtt reconnects on its own.
 */
export class MqttFrameSink implements FrameSink {
  failedWrites = 0;
  private client: MqttClient | null = null;
  private baseTopic: string;

  constructor(
    private brokerUrl: string,
    private brokerOptions?: MqttSinkOptions,
    baseTopic: string = 'lightbar'
  ) {
    this.baseTopic = baseTopic;
  }

  get topic(): string {
    return `${this.baseTopic}/frame`;
  }

  connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const options: IClientOptions = {
        clientId: this.brokerOptions?.clientId || `lightbar-engine-${Date.now()}`,
        reconnectPeriod: 5000,
        connectTimeout: 10000,
      };

      if (this.brokerOptions?.username) {
        options.username = this.brokerOptions.username;
      }
      if (this.brokerOptions?.password) {
        options.password = this.brokerOptions.password;
      }

      this.client = mqtt.connect(this.brokerUrl, options);

      this.client.on('connect', () => {
        console.log(`[MQTT] Connected to broker at ${this.brokerUrl}`);
        resolve();
      });

      this.client.on('error', (error) => {
        console.error('[MQTT] Error:', error);
        reject(error);
      });

      this.client.on('reconnect', () => {
        console.log('[MQTT] Reconnecting...');
      });

      this.client.on('close', () => {
        console.log('[MQTT] Connection closed');
      });
    });
  }

  write(frame: LightbarFrame): Promise<void> {
    const client = this.client;
    if (!client || !client.connected) {
      this.failedWrites++;
      return Promise.resolve();
    }

    return new Promise((resolve) => {
      client.publish(this.topic, JSON.stringify(encodeFrame(frame)), { retain: true, qos: 0 }, (err) => {
        if (err) {
          this.failedWrites++;
        }
        resolve();
      });
    });
  }

  async close(): Promise<void> {
    if (this.client) {
      await this.client.endAsync();
      this.client = null;
    }
  }
}
