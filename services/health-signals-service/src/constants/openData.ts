import { ComplaintCategory } from "../interfaces/complaint";

// NYC 311 Service Requests from 2010 to Present
export const OPEN_DATA_URL = "https://data.cityofnewyork.us/resource/erm2-nwe9.json";

export const COMPLAINT_CATEGORIES = ["rodent", "sanitation", "food"] as const satisfies readonly ComplaintCategory[];

export const COMPLAINT_TYPES_BY_CATEGORY: Record<ComplaintCategory, readonly string[]> = {
  rodent: ["Rodent"],
  sanitation: [
    "Dirty Condition",
    "Dirty Conditions",
    "Sanitation Condition",
    "Unsanitary Condition",
    "Missed Collection",
  ],
  food: ["Food Poisoning", "Food Establishment"],
};

export const DEFAULT_PAGE_SIZE = 1000;
export const DEFAULT_MAX_PAGES = 10;
