import * as dotenv from 'dotenv';
import { AnimationRegistry } from './animations';
import { LightbarEngine } from './engine';
import { MqttFrameSink } from './mqtt-sink';
import { loadSettings } from './settings';
import { FileFrameSink, FrameSink, MultiFrameSink } from './sink';

dotenv.config();

async function main() {
  console.log('[Main] Starting lightbar engine...');

  try {
    const settings = loadSettings();

    const registry = await AnimationRegistry.open(settings.animationsFile);
    console.log(`[Main] ${registry.list().length} animation(s) available`);

    const sinks: FrameSink[] = [new FileFrameSink(settings.ipcPath)];
    console.log(`[Main] Writing frames to ${settings.ipcPath}`);

    if (settings.mqtt) {
      const mqttSink = new MqttFrameSink(
        settings.mqtt.brokerUrl,
        {
          username: settings.mqtt.username,
          password: settings.mqtt.password,
        },
        settings.mqtt.baseTopic
      );
      try {
        await mqttSink.connect();
        sinks.push(mqttSink);
        console.log(`[Main] Mirroring frames to ${mqttSink.topic}`);
      } catch (error) {
        // The file channel is enough for the adapter; run without the mirror.
        console.error('[Main] MQTT unavailable, continuing without it:', error);
        await mqttSink.close();
      }
    }

    const sink = new MultiFrameSink(sinks);
    const engine = new LightbarEngine(registry, sink, { tickIntervalMs: settings.tickIntervalMs });

    if (settings.initialConfig) {
      await engine.applyConfig(settings.initialConfig);
      console.log(`[Main] Applied initial config (mode: ${settings.initialConfig.mode})`);
    }

    console.log('[Main] Engine running.');

    const shutdown = async () => {
      console.log('[Main] Shutting down...');
      await engine.stop();
      await sink.close();
      process.exit(0);
    };

    process.on('SIGINT', () => {
      void shutdown();
    });

    process.on('SIGTERM', () => {
      void shutdown();
    });
  } catch (error) {
    console.error('[Main] Fatal error:', error);
    process.exit(1);
  }
}

void main();
