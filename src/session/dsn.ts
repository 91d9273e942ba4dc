export const DEFAULT_PORT = '1521';

export function buildDsn(host: string, port: string, service: string): string {
  return (
    '(DESCRIPTION=' +
    `(ADDRESS=(PROTOCOL=TCP)(HOST=${host})(PORT=${port}))` +
    `(CONNECT_DATA=(SERVICE_NAME=${service})))`
  );
}
