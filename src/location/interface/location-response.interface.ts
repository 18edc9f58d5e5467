export interface LocationSummary {
  id: number;
  name: string;
  city: string;
  state: string;
  country: string;
}

export interface LocationDetail extends LocationSummary {
  description: string | null;
  created_at: string;
  updated_at: string;
}
