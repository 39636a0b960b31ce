export type MessagingPlatform = 'telegram';

export interface PlatformRuntime {
  platform: MessagingPlatform;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** True while the inbound loop is connected and polling. */
  isConnected(): boolean;
}
