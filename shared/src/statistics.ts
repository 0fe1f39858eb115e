// Time-grouped count; buckets are contiguous and zero-filled
export interface AggregateBucket {
  period: string;   // YYYY-MM-DD, YYYY-Www or YYYY-MM
  start: string;
  end: string;
  count: number;
}

// Inclusive calendar span
export interface DateSpan {
  start: string;
  end: string;
}

export interface PeriodComparison {
  currentStart: string;
  currentEnd: string;
  previousStart: string;
  previousEnd: string;
  currentCount: number;
  previousCount: number;
  change: number;
  percentChange: number | null;
}

export interface CategoryCount {
  name: string;
  count: number;
}

export interface StatisticsSummary {
  totalSightings: number;
  oldestSighting: string | null;
  newestSighting: string | null;
  span: DateSpan | null;
  weekly: AggregateBucket[];
  monthly: AggregateBucket[];
  averageWeeklySightings: number;
  averageMonthlySightings: number;
  sightingsPastYear: number;
  bySpecies: CategoryCount[];
  byLocation: CategoryCount[];
  comparison: PeriodComparison | null;
}
