// Types flowing through the order time estimator.
// Everything here is plain data so an EstimateResult can be serialized as-is.

/**
 * One invoice line to pick, as the estimator sees it.
 */
export interface OrderLine {
  itemCode: string;
  qty: number | null;
  unitType: string | null;
  location: string | null; // raw warehouse location, e.g. '10-01-A02'
  zone: string | null;
  corridor: string | null; // fallback when the location does not parse
}

/**
 * Item master attributes that influence pick and pack time.
 * A line whose item is absent from the master is estimated with `null`.
 */
export interface ItemMaster {
  itemCode: string;
  active: boolean;
  unitType: string | null;
  fragility: string | null;
  spillRisk: boolean | string | null;
  pressureSensitivity: string | null;
  temperatureSensitivity: string | null;
  pickDifficulty: number | string | null;
  piecesPerUnit: number | null;
  packAttribute: string | null; // 'VPACK' for virtual packs
}

export interface ParsedLocation {
  corridor: string | null;
  bay: number | null;
  level: string | null;
  pos: number | null;
}

/**
 * A unique physical location visited during picking.
 * Identity is (zone, corridor, bay, level, pos); `location` keeps the raw
 * string of the first line seen at the stop.
 */
export interface Stop {
  zone: string;
  corridor: string | null;
  bay: number | null;
  level: string | null;
  pos: number | null;
  location: string | null;
}

export type StopSortKey = [number, number, number, string, number];

/**
 * Cost contributed by moving onto one stop of the ordered route.
 */
export interface TravelStep {
  index: number;
  stopKey: string;
  alignSeconds: number;
  zoneSwitchSeconds: number;
  corridorSeconds: number;
  baySeconds: number;
  posSeconds: number;
  upperExtraSeconds: number;
  totalSeconds: number;
}

export interface TravelDebug {
  stops: number;
  zoneSwitches: number;
  corridorChanges: number;
  baySteps: number;
  posSteps: number;
  stairsSeconds: number;
  steps: TravelStep[];
}

export interface TravelEstimate {
  totalSeconds: number;
  debug: TravelDebug;
}

export type FragilityLevel = 'yes' | 'semi';

export interface HandlingFlags {
  fragility: FragilityLevel | null;
  spill: boolean;
  pressureHigh: boolean;
  heatSensitive: boolean; // only ever true in summer mode
}

export type SpecialGroup = 'fragile' | 'spill' | 'pressure_high' | 'heat_sensitive_summer';

export interface PickDebug {
  unitType: string;
  qty: number;
  base: number;
  perQty: number;
  alignScan: number;
  level: string | null;
  levelPenalty: number;
  ladderPenalty: number;
  difficulty: string;
  difficultyPenalty: number;
  handling: number;
  flags: HandlingFlags;
  summerMode: boolean;
}

export interface PickEstimate {
  seconds: number;
  debug: PickDebug;
}

export interface PackDebug {
  totalLines: number;
  specialGroups: SpecialGroup[];
  specialGroupCount: number;
}

export interface PackEstimate {
  seconds: number;
  debug: PackDebug;
}

export interface LineEstimate {
  itemCode: string;
  location: string | null;
  unitType: string;
  qty: number;
  pickSeconds: number;
  walkSeconds: number; // travel attributed to the first line at each stop
  totalSeconds: number;
  minutes: number;
  debug: PickDebug;
}

export interface EstimateBreakdown {
  overheadSeconds: number;
  travelSeconds: number;
  pickSeconds: number;
  packSeconds: number;
}

export interface EstimateResult {
  invoiceNo: string;
  totalSeconds: number;
  totalMinutes: number;
  breakdown: EstimateBreakdown;
  breakdownMinutes: EstimateBreakdown;
  lines: LineEstimate[];
  travel: TravelDebug;
  pack: PackDebug;
  stopsOrdered: Stop[];
  summerMode: boolean;
  paramsVersion: string;
  estimatorVersion: string;
  calculatedAt: string;
}

export interface EstimateInput {
  invoiceNo: string;
  params: unknown;
  summerMode: boolean;
  lines: OrderLine[];
  itemsByCode: Map<string, ItemMaster>;
  now?: Date;
}
