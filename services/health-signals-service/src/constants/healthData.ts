export const PRESS_RELEASES_URL = "https://www.nyc.gov/site/doh/about/press/recent-press-releases.page";
export const PRESS_RELEASES_ORIGIN = "https://www.nyc.gov";

export const RESPIRATORY_DATA_URL =
  "https://raw.githubusercontent.com/nychealth/respiratory-illness-data/main/data/emergencyDeptData.csv";

export const CITYWIDE_SUBMETRIC = "Overall";

export const KEY_RESPIRATORY_METRICS = [
  "COVID-19 visits",
  "Influenza visits",
  "RSV visits",
  "Respiratory illness visits",
] as const;
