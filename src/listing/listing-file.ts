import fs from 'node:fs';
import { ListingSchema, type Listing } from '../schema/index.js';
import { FileNotFoundError, ListingError } from '../cli/errors.js';

export function parseListingContent(content: string, filePath: string): Listing {
  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch {
    throw new ListingError('invalid JSON', filePath);
  }

  const result = ListingSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    const where = issue && issue.path.length > 0 ? issue.path.join('.') : 'listing';
    throw new ListingError(`${where}: ${issue?.message ?? 'invalid listing'}`, filePath);
  }

  const seen = new Set<string>();
  for (const message of result.data.messages) {
    if (seen.has(message.id)) {
      throw new ListingError(`duplicate message id '${message.id}'`, filePath);
    }
    seen.add(message.id);
  }

  return result.data;
}

export function readListingFile(filePath: string): Listing {
  if (!fs.existsSync(filePath)) {
    throw new FileNotFoundError(filePath);
  }
  return parseListingContent(fs.readFileSync(filePath, 'utf-8'), filePath);
}
