export type ComplaintCategory = 'rodent' | 'sanitation' | 'food';

export interface ComplaintLocation {
  address: string | null;
  latitude: number | null;
  longitude: number | null;
}

/**
 * Normalized 311 service request
 */
export interface Complaint {
  id: string;
  complaintType: string;
  category: ComplaintCategory;
  descriptor: string | null;
  borough: string | null;
  createdAt: string;
  status: string | null;
  location: ComplaintLocation;
}
