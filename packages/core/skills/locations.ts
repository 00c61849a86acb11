/**
 * Common short names for pickup/drop points, keyed lower-case.
 */
const LOCATION_ALIASES: Record<string, string> = {
  airport: "Indira Gandhi International Airport",
  igia: "Indira Gandhi International Airport",
  igi: "Indira Gandhi International Airport",
  t1: "Terminal 1, IGI Airport",
  t2: "Terminal 2, IGI Airport",
  t3: "Terminal 3, IGI Airport",
  station: "New Delhi Railway Station",
  "railway station": "New Delhi Railway Station",
  home: "Home",
  office: "Office",
};

/**
 * Trim a location and expand a known alias. Unknown names pass through trimmed.
 */
export function normalizeLocation(location: string): string {
  const trimmed = location.trim().replace(/\s+/g, " ");
  return LOCATION_ALIASES[trimmed.toLowerCase()] ?? trimmed;
}
