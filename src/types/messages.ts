/**
 * Inbound chat messages and connection state.
 */

export interface InboundMessage {
  senderId: string;
  senderDisplayName: string;
  /** Bot or webhook author. */
  isAutomated: boolean;
  /** "<guild> / #<channel>" or "DM". */
  locationLabel: string;
  text: string;
  /** Link back to the message, when the transport has one. */
  url?: string;
}

export type ConnectionState = 'offline' | 'connecting' | 'online';

export type ConnectionReason = 'not-configured' | 'connection-error' | 'disconnected' | 'stopped';

export interface ConnectionStatus {
  state: ConnectionState;
  detail: string;
  reason?: ConnectionReason;
}

export interface NowPlaying {
  ruleId: string;
  volume: number;
}
