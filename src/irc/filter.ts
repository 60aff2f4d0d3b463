/**
 * Chat Archiver — Command Filter
 *
 * Server welcome numerics, MOTD/NAMES replies, capability acks,
 * membership and keepalive lines carry nothing worth archiving.
 */

export const IGNORED_COMMANDS: ReadonlySet<string> = new Set([
  '001', '002', '003', '004',
  '353', '366', '372', '375', '376',
  'CAP', 'JOIN', 'PONG', 'PING', 'RECONNECT',
]);

export function isIgnoredCommand(command: string): boolean {
  return IGNORED_COMMANDS.has(command);
}
