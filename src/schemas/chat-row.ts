/**
 * Chat Log Row Schema
 *
 * Zod schema for one row of the chat export. Cells arrive as strings;
 * numeric fields must hold a number, empty numeric cells fail validation.
 */

import { z } from "zod";

const numericCell = z.string().trim().min(1, "Value is required").pipe(z.coerce.number().finite());

export const chatRowSchema = z.object({
  session_code: z.string().trim().min(1, "Session code is required"),

  /** <constant>-<segment>-<channel number> */
  channel: z.string().trim().min(1, "Channel is required"),

  /** Sender's player label */
  nickname: z.string().trim().min(1, "Nickname is required"),

  body: z.string().default(""),

  /** Unix seconds */
  timestamp: numericCell,

  participant_code: z.string().trim().default(""),

  id_in_session: numericCell.pipe(z.number().int()),
});

export type ChatRow = z.infer<typeof chatRowSchema>;
