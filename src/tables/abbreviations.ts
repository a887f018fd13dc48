/**
 * Ordered abbreviation table used to shorten over-length term names.
 *
 * Earlier entries are tried first, so clear or very space-saving
 * abbreviations sit at the top. Short forms are uppercase to set them
 * apart from the lowercase names they replace.
 */
export const ABBREVIATIONS: ReadonlyArray<readonly [long: string, short: string]> = Object.freeze([
  ['bogons', 'BGN'],
  ['bogon', 'BGN'],
  ['reserved', 'RSV'],
  ['rfc1918', 'PRV'],
  ['rfc-1918', 'PRV'],
  ['internet', 'EXT'],
  ['global', 'GBL'],
  ['internal', 'INT'],
  ['customer', 'CUST'],
  ['google', 'GOOG'],
  ['border', 'BDR'],
  ['service', 'SVC'],
  ['router', 'RTR'],
  ['transit', 'TRNS'],
  ['experiment', 'EXP'],
  ['established', 'EST'],
  ['unreachable', 'UNR'],
  ['fragment', 'FRG'],
  ['accept', 'OK'],
  ['discard', 'DSC'],
  ['reject', 'REJ'],
  ['replies', 'ACK'],
  ['request', 'REQ'],
] as const);
