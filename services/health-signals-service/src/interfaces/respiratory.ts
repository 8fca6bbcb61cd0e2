/**
 * One row of the emergency department respiratory illness dataset.
 * `submetric` is a borough or age group; "Overall" is citywide.
 */
export interface RespiratoryObservation {
  date: string;
  metric: string;
  submetric: string;
  value: number;
  display: string;
}
