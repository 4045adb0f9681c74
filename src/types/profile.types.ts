export type FactorName = 'temp' | 'humidity' | 'door' | 'gas' | 'interaction' | 'outside';

export type FactorWeights = Record<FactorName, number>;

export interface LogisticCurve {
  midpoint: number;   // on the 0-100 scaled raw index
  slope: number;
}

export interface ProfileAlerts {
  high_temp: string;
  rapid_spoilage: string;
}

/**
 * Static per-product parameters, one entry of the profile table.
 */
export interface BaseProfile {
  q10: number;                      // rate multiplier per 10 °C
  ref_temp: number;                 // °C
  z_threshold: number;
  ewma_threshold: number;
  ewma_alpha: number;
  max_safe_temp: number;            // °C
  min_rate: number;
  max_rate: number;
  weights: FactorWeights;
  adaptive_q10: boolean;
  adaptive_window: number;
  adaptive_ewma: boolean;
  logistic: LogisticCurve;
  alerts: ProfileAlerts;
}

export type ProfileTable = Record<string, BaseProfile>;

/**
 * A base profile adapted to the current outside temperature, door state
 * and recent variability. `max_safe_temp` and `weights` hold the adapted values.
 */
export interface DynamicProfile extends BaseProfile {
  product: string;
  max_rate_dynamic: number;
  q10_dynamic: number;
  z_threshold_dynamic: number;
  ewma_threshold_dynamic: number;
}

export interface ProfileCatalog {
  derive(product: string, outsideTemp: number | undefined, doorOpen: number | boolean, variability?: number): DynamicProfile;
  getBaseProfile(product: string): BaseProfile;
  hasProduct(product: string): boolean;
  listProducts(): string[];
}
