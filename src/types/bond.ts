// Types du domaine : une ligne par obligation, une table par exécution

export type BondCategory = 'government' | 'corporate' | 'supranational';

export interface VolumePoint {
  /** Mois au format yyyy-MM */
  month: string;
  volume: number;
}

export interface BondRecord {
  isin: string;
  issuer: string;
  category: BondCategory | null;
  coupon: number | null;
  /** Date ISO yyyy-MM-dd */
  maturity: string | null;
  price: number;
  yieldGross: number | null;
  yieldNet: number | null;
  modifiedDuration: number | null;
  contracts: number | null;
  lastVolume: number | null;
  totalVolume: number | null;
  yearsToMaturity: number | null;
  /** Ordre chronologique, mois le plus récent en dernier, 12 au maximum */
  volumes: VolumePoint[];
}

export interface LiquidityStats {
  medianMonthlyVolumeMillion: number | null;
  minMonthlyVolumeMillion: number | null;
  maxMonthlyVolumeMillion: number | null;
  /** 0 = aucun volume, puis 1..100 selon le percentile */
  liquidityRating: number;
}

export type RatedBondRecord = BondRecord & LiquidityStats;

export interface InstrumentPayload {
  isin: string;
  html: string;
  /** Réponse brute du service de graphiques, null si indisponible */
  volumeSeries: unknown | null;
}
