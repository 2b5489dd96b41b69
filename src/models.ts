export interface Channel {
  id: string;
  name: string;
  webhookUrl: string;
  createdAt: number; // epoch ms
}

export interface TrackedAccount {
  id: string;
  handle: string;
  channelId: string;
  lastSeenId: string | null; // decimal post id, null until the baseline poll
  active: boolean;
  addedAt: number; // epoch ms
}

export interface SentRecord {
  postId: string;
  channelId: string;
  handle: string;
  text: string;
  postedAt: number; // epoch ms
  sentAt: number; // epoch ms
}

export interface Post {
  id: string;
  text: string;
  createdAt: number; // epoch ms
  likeCount: number;
  repostCount: number;
  replyCount: number;
  mediaUrls: string[];
  url: string;
}

export interface AccountWithChannel extends TrackedAccount {
  channel: Channel;
}

export interface CycleSummary {
  startedAt: number;
  finishedAt: number;
  accountsProcessed: number;
  accountsSucceeded: number;
  accountsFailed: number;
  accountsDeactivated: number;
  accountsBaselined: number;
  postsSent: number;
  postsSkipped: number;
  sendFailures: number;
  aborted: boolean;
  abortReason: string | null;
}

export interface DBSchema {
  channels: Channel[];
  accounts: TrackedAccount[];
  sent: SentRecord[];
}
