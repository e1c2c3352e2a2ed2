export type NotifierProvider = 'twilio' | 'console';

export interface SendResult {
  id: string;
}

export interface NotifierAdapter {
  readonly provider: NotifierProvider;
  /** Rejects with a NotificationError when delivery fails. */
  send(recipient: string, message: string): Promise<SendResult>;
}
