/**
 * What the Connection Manager needs from a chat transport.
 */

import type { InboundMessage } from '../types';

export interface ChatClientHandlers {
    /** Handshake finished, or a dropped session came back. */
    onReady(identity: string): void;
    /** The session dropped and the transport is trying to get it back. */
    onReconnecting(): void;
    /** The session is gone and the transport will not reconnect. */
    onDisconnect(reason: string): void;
    onMessage(message: InboundMessage): void;
}

export interface ChatClient {
    /** Resolves once login was accepted; rejects when it was not. */
    connect(token: string): Promise<void>;
    close(): Promise<void>;
    /** The client's own user id, once known. */
    readonly selfId: string | null;
}

export type ChatClientFactory = (handlers: ChatClientHandlers) => ChatClient;
