export interface Feed {
  url: string;
  title: string;
  site_url: string | null;
  description: string | null;
  last_fetched_at: string | null;
  last_fetch_error: string | null;
  created_at: string;
}

export interface FeedInput {
  url: string;
  title: string;
  site_url?: string;
  description?: string;
}

/** Feed entry of a subscription list (OPML). */
export interface FeedSubscription {
  url: string;
  title: string;
}
