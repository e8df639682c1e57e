import { PLAYER_STATE_LABELS } from '@nowplaying-bridge/protocol';
import { createLogger, setLogLevel } from '@nowplaying-bridge/shared';
import { ConfigError, USAGE, parseCommandLine, type CommandLine } from './config.js';
import { startHttpServer } from './http-server.js';
import { createFieldDecoder } from './lib/field-decoder.js';
import { FeedSubscriber } from './lib/feed-subscriber.js';
import { PlaybackStore } from './lib/playback-store.js';

const log = createLogger('Main');

function main(): void {
  let commandLine: CommandLine;
  try {
    commandLine = parseCommandLine();
  } catch (err) {
    if (err instanceof ConfigError) {
      log.error(err.message);
      console.error(`\n${USAGE}`);
      process.exit(1);
    }
    throw err;
  }

  if (commandLine.help) {
    console.log(USAGE);
    return;
  }

  const { config } = commandLine;
  setLogLevel(config.logLevel);

  log.info('Starting now-playing bridge');
  log.info(`MQTT: ${config.mqttHost}:${config.mqttPort} (prefix: ${config.topicPrefix})`);
  log.info(`HTTP: ${config.httpHost}:${config.httpPort}`);

  const store = new PlaybackStore();
  store.subscribe((current, previous) => {
    if (current.playerState !== previous.playerState) {
      log.info(
        `Playback: ${PLAYER_STATE_LABELS[previous.playerState]} → ${PLAYER_STATE_LABELS[current.playerState]}`,
      );
    }
  });

  const feed = new FeedSubscriber({
    host: config.mqttHost,
    port: config.mqttPort,
    username: config.mqttUser,
    password: config.mqttPass,
    topicPrefix: config.topicPrefix,
    decode: createFieldDecoder({
      topicPrefix: config.topicPrefix,
      clearTrackOnSessionEnd: config.clearOnStop,
    }),
    store,
  });
  feed.start();

  const server = startHttpServer(config.httpHost, config.httpPort, { store, feed });

  const shutdown = (signal: NodeJS.Signals) => {
    log.info(`Received ${signal}, shutting down`);
    feed.stop();
    server.close(() => process.exit(0));
  };
  process.once('SIGINT', shutdown);
  process.once('SIGTERM', shutdown);
}

main();
