export type ConversationStatus = 'open' | 'pending' | 'resolved' | 'snoozed'

/**
 * Outbound side of the support desk. Session ids are the channel's own
 * conversation references; implementations translate them.
 */
export interface SupportChannel {
  readonly name: string
  sendPublicReply(sessionId: string, text: string): Promise<void>
  createPrivateNote(
    sessionId: string,
    text: string,
    labels: readonly string[]
  ): Promise<void>
  setConversationStatus(
    sessionId: string,
    status: ConversationStatus
  ): Promise<void>
}
