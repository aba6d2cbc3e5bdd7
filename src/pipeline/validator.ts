import { errorMessage } from "./error_utils.js";
import { isIsoTimestamp } from "./timestamps.js";
import {
  CATEGORIES,
  ENGAGEMENT_FIELDS,
  PLATFORMS,
  SENTIMENTS,
  type Category,
  type Engagement,
  type Platform,
  type PostMetadata,
  type Sentiment,
  type SocialPost,
} from "./types.js";

export const MAX_CONTENT_LENGTH = 10_000;

export const REQUIRED_FIELDS = [
  "post_id",
  "user_id",
  "username",
  "platform",
  "content",
  "topic",
  "engagement",
  "metadata",
  "sentiment",
  "category",
] as const;

export type ValidationResult =
  | { valid: true; errors: []; post: SocialPost }
  | { valid: false; errors: string[] };

type UnknownRecord = Record<string, unknown>;

function isRecord(value: unknown): value is UnknownRecord {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function hasKey(record: UnknownRecord, key: string): boolean {
  return Object.prototype.hasOwnProperty.call(record, key);
}

const isString = (value: unknown): value is string => typeof value === "string";

const isNonEmptyString = (value: unknown): value is string => isString(value) && value.trim().length > 0;

const isPositiveInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value > 0;

const isNonNegativeInteger = (value: unknown): value is number =>
  typeof value === "number" && Number.isInteger(value) && value >= 0;

const isBoolean = (value: unknown): value is boolean => typeof value === "boolean";

const isPlatform = (value: unknown): value is Platform => PLATFORMS.some((platform) => platform === value);

const isSentiment = (value: unknown): value is Sentiment => SENTIMENTS.some((sentiment) => sentiment === value);

const isCategory = (value: unknown): value is Category => CATEGORIES.some((category) => category === value);

export function characterCount(content: string): number {
  return Array.from(content).length;
}

/**
 * Reads `record[key]` through a type guard. Absent keys yield undefined
 * without an error since the missing-fields check already reports them.
 */
function checkField<T>(
  record: UnknownRecord,
  key: string,
  guard: (value: unknown) => value is T,
  message: (value: unknown) => string,
  errors: string[],
): T | undefined {
  if (!hasKey(record, key)) {
    return undefined;
  }
  const value = record[key];
  if (guard(value)) {
    return value;
  }
  errors.push(message(value));
  return undefined;
}

function checkContent(record: UnknownRecord, errors: string[]): string | undefined {
  if (!hasKey(record, "content")) {
    return undefined;
  }
  const content = record.content;
  if (!isNonEmptyString(content)) {
    errors.push("content must be a non-empty string");
    return undefined;
  }
  if (characterCount(content) > MAX_CONTENT_LENGTH) {
    errors.push(`content exceeds maximum length of ${MAX_CONTENT_LENGTH} characters`);
    return undefined;
  }
  return content;
}

function checkEngagement(record: UnknownRecord, errors: string[]): Engagement | undefined {
  if (!hasKey(record, "engagement")) {
    return undefined;
  }
  const engagement = record.engagement;
  if (!isRecord(engagement)) {
    errors.push("engagement must be an object");
    return undefined;
  }

  const missing = ENGAGEMENT_FIELDS.filter((field) => !hasKey(engagement, field));
  if (missing.length > 0) {
    errors.push(`Missing engagement fields: ${missing.join(", ")}`);
  }

  const errorCount = errors.length;
  const likes = checkField(engagement, "likes", isNonNegativeInteger, () => "engagement.likes must be a non-negative integer", errors);
  const shares = checkField(engagement, "shares", isNonNegativeInteger, () => "engagement.shares must be a non-negative integer", errors);
  const comments = checkField(engagement, "comments", isNonNegativeInteger, () => "engagement.comments must be a non-negative integer", errors);
  const views = checkField(engagement, "views", isNonNegativeInteger, () => "engagement.views must be a non-negative integer", errors);

  if (missing.length > 0 || errors.length > errorCount) {
    return undefined;
  }
  if (likes === undefined || shares === undefined || comments === undefined || views === undefined) {
    return undefined;
  }
  return { likes, shares, comments, views };
}

function checkMetadata(record: UnknownRecord, errors: string[]): PostMetadata | undefined {
  if (!hasKey(record, "metadata")) {
    return undefined;
  }
  const metadata = record.metadata;
  if (!isRecord(metadata)) {
    errors.push("metadata must be an object");
    return undefined;
  }

  const errorCount = errors.length;
  const timestamp = isIsoTimestamp(metadata.timestamp) ? metadata.timestamp : undefined;
  if (timestamp === undefined) {
    errors.push("metadata.timestamp must be a valid ISO format datetime");
  }

  let hashtags: string[] | undefined;
  if (hasKey(metadata, "hashtags")) {
    const value = metadata.hashtags;
    if (!Array.isArray(value)) {
      errors.push("metadata.hashtags must be an array");
    } else if (!value.every(isString)) {
      errors.push("All hashtags must be strings");
    } else {
      hashtags = value.filter(isString);
    }
  }

  const language = checkField(metadata, "language", isString, () => "metadata.language must be a string", errors);
  const verifiedUser = checkField(metadata, "verified_user", isBoolean, () => "metadata.verified_user must be a boolean", errors);
  const hasMedia = checkField(metadata, "has_media", isBoolean, () => "metadata.has_media must be a boolean", errors);
  const mentions = checkField(metadata, "mentions", isNonNegativeInteger, () => "metadata.mentions must be a non-negative integer", errors);

  if (timestamp === undefined || errors.length > errorCount) {
    return undefined;
  }

  const result: PostMetadata = { timestamp };
  if (language !== undefined) result.language = language;
  if (verifiedUser !== undefined) result.verified_user = verifiedUser;
  if (hasMedia !== undefined) result.has_media = hasMedia;
  if (hashtags !== undefined) result.hashtags = hashtags;
  if (mentions !== undefined) result.mentions = mentions;
  return result;
}

function collectErrors(input: unknown, errors: string[]): SocialPost | undefined {
  if (!isRecord(input)) {
    errors.push("Validation error: record must be an object");
    return undefined;
  }

  const missing = REQUIRED_FIELDS.filter((field) => !hasKey(input, field));
  if (missing.length > 0) {
    errors.push(`Missing required fields: ${missing.join(", ")}`);
  }

  const postId = checkField(input, "post_id", isNonEmptyString, () => "post_id must be a non-empty string", errors);
  const userId = checkField(input, "user_id", isPositiveInteger, () => "user_id must be a positive integer", errors);
  const username = checkField(input, "username", isString, () => "username must be a string", errors);
  const platform = checkField(input, "platform", isPlatform, (value) => `Invalid platform: ${String(value)}`, errors);
  const content = checkContent(input, errors);
  const engagement = checkEngagement(input, errors);
  const metadata = checkMetadata(input, errors);
  const sentiment = checkField(input, "sentiment", isSentiment, (value) => `Invalid sentiment: ${String(value)}`, errors);
  const category = checkField(input, "category", isCategory, (value) => `Invalid category: ${String(value)}`, errors);
  const topic = checkField(input, "topic", isString, () => "topic must be a string", errors);

  if (
    errors.length > 0 ||
    postId === undefined ||
    userId === undefined ||
    username === undefined ||
    platform === undefined ||
    content === undefined ||
    topic === undefined ||
    engagement === undefined ||
    metadata === undefined ||
    sentiment === undefined ||
    category === undefined
  ) {
    return undefined;
  }

  return {
    post_id: postId,
    user_id: userId,
    username,
    platform,
    content,
    topic,
    engagement,
    metadata,
    sentiment,
    category,
  };
}

/**
 * Checks an untyped record against the post schema. All failures are
 * collected rather than stopping at the first one, and the function never
 * throws: anything unexpected becomes a `Validation error: ...` entry.
 */
export function validatePost(input: unknown): ValidationResult {
  const errors: string[] = [];
  let post: SocialPost | undefined;

  try {
    post = collectErrors(input, errors);
  } catch (error) {
    errors.push(`Validation error: ${errorMessage(error)}`);
  }

  if (post === undefined || errors.length > 0) {
    return { valid: false, errors: errors.length > 0 ? errors : ["Validation error: incomplete record"] };
  }
  return { valid: true, errors: [], post };
}
