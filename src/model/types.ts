/**
 * In-memory model assembled from the Signal catalog and message JSON.
 */

import { z } from "zod";

export interface Contact {
  id: string;
  /** Display name, falling back to profile name, then phone number. */
  name: string | null;
  number: string | null;
  profileName: string | null;
  isGroup: boolean;
  /** Resolved member display names, groups only. */
  members?: string[];
}

// Fields are lenient: a malformed value reads as absent so one bad field
// costs only that field, not the message.
export const attachmentSchema = z
  .object({
    path: z.string().nullish().catch(null),
    fileName: z.string().nullish().catch(null),
    contentType: z.string().nullish().catch(null),
  })
  .passthrough();

export const messageSchema = z
  .object({
    timestamp: z.number().nullish().catch(null),
    sent_at: z.number().nullish().catch(null),
    body: z.string().nullish().catch(null),
    type: z.string().nullish().catch(null),
    source: z.string().nullish().catch(null),
    conversationId: z.string().nullish().catch(null),
    attachments: z.array(attachmentSchema.catch({})).nullish().catch(null),
  })
  .passthrough();

export type Attachment = z.infer<typeof attachmentSchema>;
export type Message = z.infer<typeof messageSchema>;

export type ContactMap = Map<string, Contact>;

/** Contact id → messages ascending by send time. */
export type ConversationMap = Map<string, Message[]>;

export interface LoadResult {
  contacts: ContactMap;
  conversations: ConversationMap;
}
