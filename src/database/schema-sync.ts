/** Whether this process owns the schema: anything but an explicit `SYNC_DATABASE=false`. */
export function isSchemaSyncEnabled(value: string | undefined): boolean {
  return value !== 'false';
}
