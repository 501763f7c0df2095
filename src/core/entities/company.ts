export type CompanyProfile = {
  symbol: string;
  companyName: string;
  marketCap: number;
  currency: string;
  exchange: string;
  exchangeFullName: string;
  industry?: string;
  sector?: string;
  country?: string;
  website?: string;
  description?: string;
  ceo?: string;
  image?: string;
  ipoDate?: string;
  isActivelyTrading: boolean;
  rawPayload: unknown;
};

export type CompanyEntity = CompanyProfile & {
  id: number;
  createdAt: Date;
  updatedAt: Date;
};
