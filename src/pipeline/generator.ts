import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";
import { z } from "zod";

import { createRng, type RandomSource } from "./utils.js";
import { PLATFORMS, SENTIMENTS, type Category, type Engagement, type Platform, type SocialPost } from "./types.js";

const PostTemplatesSchema = z.object({
  usernames: z.array(z.string().min(1)).min(1),
  contentTemplates: z.array(z.string().includes("{topic}")).min(1),
  topics: z.array(z.string().min(1)).min(1),
  hashtagPools: z.record(z.array(z.string().min(1)).min(1)),
  defaultHashtags: z.array(z.string().min(1)).min(1),
});

export type PostTemplates = z.infer<typeof PostTemplatesSchema>;

export const DEFAULT_TEMPLATES_PATH = fileURLToPath(new URL("../../data/post_templates.json", import.meta.url));

export function loadPostTemplates(path: string = DEFAULT_TEMPLATES_PATH): PostTemplates {
  const raw: unknown = JSON.parse(readFileSync(path, "utf8"));
  return PostTemplatesSchema.parse(raw);
}

const ENGAGEMENT_MULTIPLIERS: Record<Platform, number> = {
  twitter: 1.0,
  facebook: 1.5,
  instagram: 2.0,
  linkedin: 0.8,
  tiktok: 3.0,
};

const HOUR_MS = 60 * 60 * 1000;

/**
 * Keyword rules over the lower-cased content; the first match wins.
 */
export function categorizeContent(content: string): Category {
  const text = content.toLowerCase();
  if (text.includes("tutorial") || text.includes("how to")) return "educational";
  if (text.includes("breaking") || text.includes("news")) return "news";
  if (text.includes("question") || text.includes("?")) return "discussion";
  if (text.includes("tip") || text.includes("hack")) return "advice";
  return "general";
}

export interface PostGeneratorOptions {
  templates?: PostTemplates;
  /** Ignored when `random` is given. */
  seed?: number;
  random?: RandomSource;
  now?: () => Date;
}

export class PostGenerator {
  private readonly templates: PostTemplates;
  private readonly random: RandomSource;
  private readonly now: () => Date;
  private generated = 0;

  constructor(options: PostGeneratorOptions = {}) {
    this.templates = options.templates ?? loadPostTemplates();
    this.random = options.random ?? createRng(options.seed);
    this.now = options.now ?? (() => new Date());
  }

  get generatedCount(): number {
    return this.generated;
  }

  generate(): SocialPost {
    const now = this.now();
    const platform = this.pick(PLATFORMS);
    const topic = this.pick(this.templates.topics);
    const content = this.pick(this.templates.contentTemplates).replaceAll("{topic}", topic);
    const postTime = new Date(now.getTime() - this.uniform(0, 24) * HOUR_MS);

    const post: SocialPost = {
      post_id: `post_${this.generated + 1}_${Math.floor(now.getTime() / 1000)}`,
      user_id: this.randomInt(1000, 9999),
      username: this.pick(this.templates.usernames),
      platform,
      content,
      topic,
      engagement: this.buildEngagement(platform),
      metadata: {
        timestamp: postTime.toISOString(),
        language: "en",
        verified_user: this.random() < 0.5,
        has_media: this.random() < 0.5,
        hashtags: this.sample(this.templates.hashtagPools[topic] ?? this.templates.defaultHashtags, this.randomInt(1, 3)),
        mentions: this.randomInt(0, 3),
      },
      sentiment: this.pick(SENTIMENTS),
      category: categorizeContent(content),
    };

    this.generated += 1;
    return post;
  }

  private buildEngagement(platform: Platform): Engagement {
    const base = this.randomInt(10, 1000) * ENGAGEMENT_MULTIPLIERS[platform];
    return {
      likes: Math.floor(base * this.uniform(0.8, 1.2)),
      shares: Math.floor(base * 0.1 * this.uniform(0.5, 1.5)),
      comments: Math.floor(base * 0.05 * this.uniform(0.3, 2.0)),
      views: Math.floor(base * 10 * this.uniform(5, 15)),
    };
  }

  private pick<T>(items: readonly T[]): T {
    return items[Math.floor(this.random() * items.length)];
  }

  private uniform(min: number, max: number): number {
    return min + this.random() * (max - min);
  }

  private randomInt(min: number, max: number): number {
    return min + Math.floor(this.random() * (max - min + 1));
  }

  private sample<T>(items: readonly T[], count: number): T[] {
    const pool = [...items];
    const picked: T[] = [];
    while (picked.length < count && pool.length > 0) {
      const [item] = pool.splice(Math.floor(this.random() * pool.length), 1);
      picked.push(item);
    }
    return picked;
  }
}
