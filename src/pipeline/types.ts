export type FeedSource = {
  readonly url: string;
  readonly label: string;
};

export type RawEntry = {
  readonly title: string;
  readonly link: string;
  readonly description: string;
  readonly publishedRaw: string;
  readonly category: string;
  readonly mediaImageUrl: string | null;
};

export type NormalizedItem = {
  readonly identity: string;
  readonly title: string;
  readonly description: string;
  readonly link: string;
  readonly imageUrl: string | null;
  readonly category: string | null;
  readonly publishedAt: Date | null;
  readonly source: string;
};

export type PollResult = {
  readonly source: FeedSource;
  readonly items: ReadonlyArray<NormalizedItem>;
  readonly error: string | null;
};

export type RunState = {
  readonly lastRunTimestamp: Date;
  readonly seenIdentities: ReadonlySet<string>;
};

export type IdentityStrategy = "link" | "hash";
export type DescriptionFormat = "text" | "markdown";
export type DedupPolicy = "identity" | "identity-and-time";
