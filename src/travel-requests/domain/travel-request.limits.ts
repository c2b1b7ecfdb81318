// Column widths, shared by the table definition and the request DTOs
export const TRAVEL_REQUEST_LIMITS = {
  purpose: 100,
  place: 100,
  lodgingInfo: 100,
  additional: 500,
  note: 300,
} as const;
