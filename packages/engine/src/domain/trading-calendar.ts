/** Broker server time is carried as a Date whose UTC fields read as the server's wall clock. */

/** YYYY-MM-DD of the server-time trading day. */
export function dayKey(serverTime: Date): string {
  return serverTime.toISOString().slice(0, 10);
}

/** Midnight (server time) opening the trading day, ISO. */
export function dayStart(serverTime: Date): string {
  return `${dayKey(serverTime)}T00:00:00.000Z`;
}

export function isWeekend(serverTime: Date): boolean {
  const day = serverTime.getUTCDay();
  return day === 0 || day === 6;
}

/** Last instant of the trading day, used as the default expiry of a day's pending order. */
export function endOfDay(serverTime: Date): string {
  return `${dayKey(serverTime)}T23:59:59.000Z`;
}
