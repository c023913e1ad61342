import {
  ChannelType,
  ChatInputCommandInteraction,
  Client,
  Events,
  GatewayIntentBits,
  Message,
  REST,
  Routes,
  SlashCommandBuilder
} from 'discord.js';
import { KBSettings, parseSettingValue } from '../config.js';
import { getErrorMessage } from '../errors.js';
import { ingestBuffer, listDocuments } from '../ingest/pipeline.js';
import { answerQuestion, formatAnswer } from '../retrieval/query.js';
import { changeSettings, currentSettings, KBServices } from '../services.js';

const REPLY_LIMIT = 1900;

const commands = [
  new SlashCommandBuilder()
    .setName('ask')
    .setDescription('Ask a question about the uploaded documents')
    .addStringOption((o) => o.setName('question').setDescription('Question').setRequired(true))
    .addIntegerOption((o) => o.setName('top_k').setDescription('How many chunks to use').setMinValue(1))
    .addStringOption((o) => o.setName('collection').setDescription('Only search this collection')),
  new SlashCommandBuilder()
    .setName('ingest')
    .setDescription('Ingest a PDF, text, markdown or HTML file')
    .addAttachmentOption((o) => o.setName('file').setDescription('Document').setRequired(true))
    .addStringOption((o) => o.setName('collection').setDescription('Collection name')),
  new SlashCommandBuilder().setName('documents').setDescription('List ingested documents'),
  new SlashCommandBuilder()
    .setName('kbconfig')
    .setDescription('Show or update runtime settings')
    .addStringOption((o) =>
      o
        .setName('action')
        .setDescription('Action')
        .setRequired(true)
        .addChoices(
          { name: 'show', value: 'show' },
          { name: 'set-top-k', value: 'topK' },
          { name: 'set-threshold', value: 'scoreThreshold' },
          { name: 'set-empty-context-policy', value: 'emptyContextPolicy' },
          { name: 'autosummary-on', value: 'autosummary-on' },
          { name: 'autosummary-off', value: 'autosummary-off' },
          { name: 'set-summary-channel', value: 'summaryChannelId' }
        )
    )
    .addStringOption((o) => o.setName('value').setDescription('New value for set-* actions'))
].map((c) => c.toJSON());

export function formatSettings(settings: KBSettings): string {
  return [
    'KB settings:',
    `- topK: ${settings.topK}`,
    `- scoreThreshold: ${settings.scoreThreshold}`,
    `- emptyContextPolicy: ${settings.emptyContextPolicy}`,
    `- autoSummaryPostEnabled: ${settings.autoSummaryPostEnabled}`,
    `- summaryChannelId: ${settings.summaryChannelId || '(unset)'}`
  ].join('\n');
}

function applySetting(services: KBServices, key: string, value: string): string {
  try {
    const patch = parseSettingValue(key, value);
    changeSettings(services, patch);
    const changes = Object.entries(patch).map(([name, v]) => `${name} set to ${v === null ? '(unset)' : String(v)}`);
    return `✅ ${changes.join(', ')}`;
  } catch (e) {
    return `⚠️ ${getErrorMessage(e)}`;
  }
}

export function applyKbTextCommand(services: KBServices, content: string): string | null {
  const trimmed = content.trim();
  if (trimmed === '!kb settings') return formatSettings(currentSettings(services));
  if (trimmed === '!kb summary on') {
    changeSettings(services, { autoSummaryPostEnabled: true });
    return '✅ Auto-summary posting enabled';
  }
  if (trimmed === '!kb summary off') {
    changeSettings(services, { autoSummaryPostEnabled: false });
    return '✅ Auto-summary posting disabled';
  }
  if (trimmed.startsWith('!kb summary channel ')) {
    const channelId = trimmed.replace('!kb summary channel ', '').trim().replace(/[<#>]/g, '');
    if (!channelId) return '⚠️ Provide a valid channel id or mention.';
    changeSettings(services, { summaryChannelId: channelId });
    return `✅ Summary channel set to ${channelId}`;
  }

  const match = /^!kb (topk|threshold|policy) (.+)$/.exec(trimmed);
  if (match) {
    const key = match[1] === 'topk' ? 'topK' : match[1] === 'threshold' ? 'scoreThreshold' : 'emptyContextPolicy';
    return applySetting(services, key, match[2]);
  }
  return null;
}

export async function documentsReply(services: KBServices): Promise<string> {
  try {
    const docs = await listDocuments(services);
    const lines = docs.map((d) => `• ${d.id} ${d.filename} (${d.chunk_count} chunks, ${d.collection})`);
    return (lines.length ? lines.join('\n') : 'No documents ingested yet.').slice(0, REPLY_LIMIT);
  } catch (e) {
    return `⚠️ ${getErrorMessage(e)}`;
  }
}

export function kbConfigReply(services: KBServices, action: string, value: string): string {
  try {
    if (action === 'show') return formatSettings(currentSettings(services));
    if (action === 'autosummary-on') {
      changeSettings(services, { autoSummaryPostEnabled: true });
      return '✅ Auto-summary posting enabled';
    }
    if (action === 'autosummary-off') {
      changeSettings(services, { autoSummaryPostEnabled: false });
      return '✅ Auto-summary posting disabled';
    }
    return applySetting(services, action, value);
  } catch (e) {
    return `⚠️ ${getErrorMessage(e)}`;
  }
}

export async function registerCommands(): Promise<void> {
  const token = process.env.DISCORD_BOT_TOKEN;
  const clientId = process.env.DISCORD_CLIENT_ID;
  const guildId = process.env.DISCORD_GUILD_ID;
  if (!token || !clientId || !guildId) return;

  const rest = new REST({ version: '10' }).setToken(token);
  await rest.put(Routes.applicationGuildCommands(clientId, guildId), { body: commands });
}

async function downloadAttachment(url: string): Promise<Buffer> {
  const res = await fetch(url);
  if (!res.ok) {
    throw new Error(`Attachment download failed: ${res.status} ${res.statusText}`);
  }
  return Buffer.from(await res.arrayBuffer());
}

export async function startDiscordBot(services: KBServices): Promise<void> {
  const token = process.env.DISCORD_BOT_TOKEN;
  if (!token) return;

  const client = new Client({
    intents: [GatewayIntentBits.Guilds, GatewayIntentBits.GuildMessages, GatewayIntentBits.MessageContent]
  });

  async function maybePostSummary(summary: string): Promise<void> {
    const settings = currentSettings(services);
    if (!settings.autoSummaryPostEnabled || !settings.summaryChannelId) return;
    const channel = await client.channels.fetch(settings.summaryChannelId).catch((e: unknown) => {
      console.error(`Summary channel ${settings.summaryChannelId} unavailable: ${getErrorMessage(e)}`);
      return null;
    });
    if (channel?.type === ChannelType.GuildText) {
      await channel.send(summary.slice(0, REPLY_LIMIT));
    }
  }

  client.once(Events.ClientReady, (c) => {
    console.log(`Discord bot ready as ${c.user.tag}`);
  });

  client.on(Events.InteractionCreate, async (interaction) => {
    if (!interaction.isChatInputCommand()) return;
    try {
      await handleCommand(interaction);
    } catch (e) {
      console.error(`/${interaction.commandName} failed: ${getErrorMessage(e)}`);
    }
  });

  async function handleCommand(interaction: ChatInputCommandInteraction): Promise<void> {
    if (interaction.commandName === 'ingest') {
      const file = interaction.options.getAttachment('file', true);
      const collection = interaction.options.getString('collection') ?? undefined;
      await interaction.reply(`👀 Ingesting ${file.name}`);
      try {
        const buffer = await downloadAttachment(file.url);
        const result = await ingestBuffer(services, buffer, file.name, {
          collection,
          onIngested: async ({ summary }) => maybePostSummary(summary)
        });
        await interaction.followUp(`✅ Ingested ${result.filename} as ${result.documentId} (${result.chunksProcessed} chunks)`);
      } catch (e) {
        await interaction.followUp(`⚠️ Failed: ${getErrorMessage(e)}`);
      }
    }

    if (interaction.commandName === 'ask') {
      const question = interaction.options.getString('question', true);
      await interaction.deferReply();
      try {
        const result = await answerQuestion(services, {
          question,
          top_k: interaction.options.getInteger('top_k') ?? undefined,
          collection: interaction.options.getString('collection') ?? undefined
        });
        await interaction.editReply(formatAnswer(result).slice(0, REPLY_LIMIT));
      } catch (e) {
        await interaction.editReply(`⚠️ ${getErrorMessage(e)}`);
      }
    }

    if (interaction.commandName === 'documents') {
      await interaction.reply(await documentsReply(services));
    }

    if (interaction.commandName === 'kbconfig') {
      const action = interaction.options.getString('action', true);
      const value = interaction.options.getString('value') ?? '';
      await interaction.reply(kbConfigReply(services, action, value));
    }
  }

  client.on(Events.MessageCreate, async (msg) => {
    if (msg.author.bot) return;
    try {
      await handleMessage(msg);
    } catch (e) {
      console.error(`Message command failed: ${getErrorMessage(e)}`);
    }
  });

  async function handleMessage(msg: Message): Promise<void> {
    const content = msg.content.trim();

    if (content.startsWith('!ask ')) {
      const question = content.replace('!ask ', '').trim();
      try {
        const result = await answerQuestion(services, { question });
        await msg.reply(formatAnswer(result).slice(0, REPLY_LIMIT));
      } catch (e) {
        await msg.reply(`⚠️ ${getErrorMessage(e)}`);
      }
    }

    if (content.startsWith('!kb ')) {
      const result = applyKbTextCommand(services, content);
      if (result) await msg.reply(result);
    }
  }

  await client.login(token);
}
