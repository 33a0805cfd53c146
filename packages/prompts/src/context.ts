/** Snapshot of "now" in the target market, embedded in the timing-aware prompts. */
export type MarketContext = {
  current_date: string;
  current_month: string;
  current_year: number;
  season: Season;
  cultural_events: string[];
  weekday: string;
  is_weekend: boolean;
  context_note: string;
};

export type Season = "Winter" | "Spring" | "Summer" | "Autumn";
