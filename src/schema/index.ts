import { z } from 'zod';

export const ThreadRoleSchema = z.enum(['root', 'child', 'orphanFirstChild', 'other']);

export const ListingMessageSchema = z.object({
  id: z.string().min(1),
  subject: z.string(),
  from: z.string().optional(),
  date: z.string().optional(),
  flags: z.array(z.string()).default([]),
  threadRole: ThreadRoleSchema,
  depth: z.number().int().min(0).default(0),
});
export type ListingMessage = z.infer<typeof ListingMessageSchema>;

export const ListingSchema = z.object({
  query: z.string().optional(),
  messages: z.array(ListingMessageSchema),
});
export type Listing = z.infer<typeof ListingSchema>;
