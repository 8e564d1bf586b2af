/**
 * discord.js transport for the Connection Manager.
 */

import { Client, Events, GatewayIntentBits, Partials } from 'discord.js';
import Logger from '../core/logger';
import { errorMessage } from '../core/errors';
import type { ChatClient, ChatClientFactory, ChatClientHandlers } from './chat-client';
import type { InboundMessage } from '../types';

export const DM_LABEL = 'DM';

/**
 * The parts of a discord.js `Message` the dispatcher needs.
 */
export interface MessageSource {
    author: { id: string; bot: boolean; globalName: string | null; username: string };
    member: { displayName: string } | null;
    guild: { name: string } | null;
    channel: object;
    webhookId: string | null;
    cleanContent: string;
    content: string;
    url: string;
}

function channelName(channel: object): string | null {
    return 'name' in channel && typeof channel.name === 'string' ? channel.name : null;
}

/**
 * Reduce a discord.js message to what the dispatcher looks at.
 */
export function toInboundMessage(message: MessageSource): InboundMessage {
    const channel = channelName(message.channel);
    const locationLabel = message.guild && channel !== null
        ? `${message.guild.name} / #${channel}`
        : DM_LABEL;
    const displayName = message.member?.displayName
        || message.author.globalName
        || message.author.username;
    return {
        senderId: message.author.id,
        senderDisplayName: displayName,
        isAutomated: message.author.bot || message.webhookId !== null,
        locationLabel,
        text: message.cleanContent || message.content || '',
        url: message.url
    };
}

export class DiscordChatClient implements ChatClient {
    logger: Logger;
    private readonly client: Client;
    private readonly handlers: ChatClientHandlers;

    constructor(handlers: ChatClientHandlers, logger?: Logger) {
        this.handlers = handlers;
        this.logger = logger || new Logger('Discord');
        this.client = new Client({
            intents: [
                GatewayIntentBits.Guilds,
                GatewayIntentBits.GuildMessages,
                GatewayIntentBits.MessageContent,
                GatewayIntentBits.DirectMessages
            ],
            partials: [Partials.Channel]
        });
        this.bindEvents();
    }

    get selfId(): string | null {
        return this.client.user?.id ?? null;
    }

    async connect(token: string): Promise<void> {
        await this.client.login(token);
    }

    async close(): Promise<void> {
        await this.client.destroy();
    }

    private bindEvents(): void {
        this.client.once(Events.ClientReady, (ready) => {
            this.handlers.onReady(ready.user.tag);
        });
        this.client.on(Events.ShardReady, () => {
            this.handlers.onReady(this.client.user?.tag ?? 'unknown');
        });
        this.client.on(Events.ShardResume, () => {
            this.handlers.onReady(this.client.user?.tag ?? 'unknown');
        });
        this.client.on(Events.ShardReconnecting, () => {
            this.handlers.onReconnecting();
        });
        // emitted only when the shard will not reconnect
        this.client.on(Events.ShardDisconnect, (event) => {
            this.handlers.onDisconnect(`gateway closed (${event.code})`);
        });
        this.client.on(Events.ShardError, (error) => {
            this.logger.warn('Gateway error:', error.message);
        });
        this.client.on(Events.MessageCreate, (message) => {
            try {
                this.handlers.onMessage(toInboundMessage(message));
            } catch (error: unknown) {
                this.logger.error('Failed to handle message:', errorMessage(error));
            }
        });
    }
}

export const createDiscordClient: ChatClientFactory = (handlers) => new DiscordChatClient(handlers);
