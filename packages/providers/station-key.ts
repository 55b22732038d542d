/**
 * Station names arrive as "강남역", "강남(2)", " 강남 " depending on the source.
 * Every lookup compares normalized keys, and matching is exact, so
 * 잠실 never matches 잠실나루 or 잠실새내.
 */

const LINE_SUFFIX = /\(\s*[^)]*\)\s*$/;
const STATION_SUFFIX = /역$/;

export function normalizeStationKey(name: string): string {
  let key = name.replace(/\s+/g, " ").trim();
  key = key.replace(LINE_SUFFIX, "").trim();
  if (key.length > 1) {
    key = key.replace(STATION_SUFFIX, "");
  }
  return key.trim();
}

export function isSameStation(a: string, b: string): boolean {
  return normalizeStationKey(a) === normalizeStationKey(b);
}

const EXIT_IN_LOCATION = /(\d+(?:-\d+)?)번\s*출입구/;

/** Exit number mentioned in a facility location text ("3번 출입구 앞"), if any */
export function exitNumberFromLocation(location: string): string | null {
  const match = location.match(EXIT_IN_LOCATION);
  return match ? match[1] : null;
}
