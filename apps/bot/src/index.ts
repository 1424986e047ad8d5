import { Client, GatewayIntentBits, MessageFlags } from 'discord.js';
import { loadBotConfig } from '@cadence/config';
import { createCommandRouter, DiscordVoiceBridge } from '@cadence/discord';
import { createLogger } from '@cadence/logger';
import { Node, NodePool } from '@cadence/music';
import { bootstrapTelemetry } from '@cadence/telemetry';
import { createChatInputCommands, type CommandContext } from './commands/index.js';
import { MusicService } from './services/music.js';

async function main() {
  const config = loadBotConfig();
  const telemetry = bootstrapTelemetry({
    serviceName: 'cadence-bot',
    serviceNamespace: 'apps',
    environment: config.environment,
    otlpEndpoint: config.otlpEndpoint,
  });
  const logger = createLogger({ name: 'bot' });

  logger.info({ env: config.environment, nodes: config.lavalink.nodes.length }, 'Bot bootstrap starting');

  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildVoiceStates],
  });

  const pool = new NodePool(logger);
  for (const nodeConfig of config.lavalink.nodes) {
    pool.addNode(
      new Node({
        ...nodeConfig,
        clientName: config.lavalink.clientName,
        logger,
      }),
    );
  }

  const voiceBridge = new DiscordVoiceBridge(client, logger);
  voiceBridge.attach();

  const music = new MusicService(pool, voiceBridge, config.player, logger);
  const commandContext: CommandContext = { logger, music };

  const commandRouter = createCommandRouter();
  const commands = createChatInputCommands();
  for (const command of commands) {
    commandRouter.register(command.data.name, (interaction) => command.execute(interaction, commandContext));
  }

  client.once('ready', async (readyClient) => {
    const connected = await pool.connectAll(readyClient.user.id);
    logger.info({ connected, total: pool.size }, 'Connected to Lavalink nodes');

    try {
      const commandPayloads = commands.map((command) => command.data.toJSON());
      await readyClient.application.commands.set(commandPayloads);
      logger.info(
        {
          user: readyClient.user.tag,
          id: readyClient.user.id,
          registeredCommands: commandRouter.names(),
        },
        'Bot connected to Discord gateway and registered slash commands',
      );
    } catch (error) {
      logger.error({ err: error }, 'Failed to register slash commands');
    }
  });

  client.on('error', (err) => {
    logger.error({ err }, 'Discord client error');
  });

  client.on('interactionCreate', async (interaction) => {
    if (!interaction.isChatInputCommand()) {
      return;
    }

    try {
      const handled = await commandRouter.dispatch(interaction);
      if (!handled) {
        logger.warn({ commandName: interaction.commandName }, 'Received slash command without registered handler');
        await interaction.reply({ content: 'Command not recognised.', flags: MessageFlags.Ephemeral });
      }
    } catch (error) {
      logger.error({ err: error, command: interaction.commandName }, 'Slash command handler failed');
      const response = {
        content: 'Something went wrong while executing that command. Please try again later.',
        flags: MessageFlags.Ephemeral,
      } as const;
      try {
        if (interaction.deferred || interaction.replied) {
          await interaction.followUp(response);
        } else {
          await interaction.reply(response);
        }
      } catch (replyError) {
        logger.error({ err: replyError, command: interaction.commandName }, 'Failed to send reply after handler error');
      }
    }
  });

  await client.login(config.discordToken);

  let shuttingDown = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (shuttingDown) {
      return;
    }
    shuttingDown = true;
    logger.info({ signal }, 'Bot shutting down');
    voiceBridge.detach();
    pool.closeAll();
    await client.destroy();
    await telemetry.shutdown();
    process.exit(0);
  };

  process.once('SIGTERM', shutdown);
  process.once('SIGINT', shutdown);

  logger.info('Bot ready and awaiting interactions.');
}

main().catch((error) => {
  const logger = createLogger({ name: 'bot' });
  logger.error({ err: error }, 'Bot failed to start');
  process.exit(1);
});
