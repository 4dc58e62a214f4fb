import { pathOf } from "../api/message.js";
import type { HttpRequest, RequestOptions } from "../api/types.js";

// Path pattern (case-insensitive regex source) -> TTL seconds. First match wins.
const DEFAULT_RULES: Array<[string, number]> = [
  // Static resources - 1 hour
  ["/courses$", 3600],
  ["/accounts", 3600],
  ["/terms", 3600],
  ["/roles", 3600],

  // Semi-static resources - 15 minutes
  ["/enrollments", 900],
  ["/sections", 900],
  ["/users$", 900],
  ["/groups$", 900],

  // Dynamic resources - 5 minutes
  ["/assignments", 300],
  ["/modules", 300],
  ["/pages", 300],
  ["/discussions", 300],
  ["/announcements", 300],
  ["/files", 300],
  ["/folders", 300],

  // Near real-time - 1 minute or never cached
  ["/submissions", 60],
  ["/grades", 0],
  ["/quiz_submissions", 0],
  ["/progress", 0],
  ["/live_assessments", 0],

  // Course-specific
  ["/courses/\\d+$", 900],
  ["/courses/\\d+/students", 300],
  ["/courses/\\d+/activity_stream", 60],
];

/**
 * Picks how long a response may be cached, by Canvas resource type.
 */
export class TtlStrategy {
  private readonly rules = new Map<string, number>(DEFAULT_RULES);

  constructor(private defaultTtl: number = 300) {}

  /** TTL in seconds; 0 means do not cache. */
  getTtl(request: HttpRequest, options: RequestOptions = {}): number {
    if (typeof options.cacheTtl === "number") {
      return Math.max(0, Math.trunc(options.cacheTtl));
    }
    if (options.cache === false) {
      return 0;
    }
    return this.getTtlForPath(pathOf(request.url));
  }

  getTtlForPath(path: string): number {
    for (const [pattern, ttl] of this.rules) {
      if (new RegExp(pattern, "i").test(path)) {
        return ttl;
      }
    }
    return this.defaultTtl;
  }

  addRule(pattern: string, ttl: number): void {
    this.rules.set(pattern, ttl);
  }

  removeRule(pattern: string): void {
    this.rules.delete(pattern);
  }

  getRules(): Record<string, number> {
    return Object.fromEntries(this.rules);
  }

  setDefaultTtl(ttl: number): void {
    this.defaultTtl = ttl;
  }

  getDefaultTtl(): number {
    return this.defaultTtl;
  }
}
