import type { CheckDescriptor } from '../control-plane/types.js';

export const DEFAULT_CATALOG: readonly CheckDescriptor[] = freezeCatalog([
  {
    id: '1.1',
    description: 'Ensure auditing is enabled',
    query: "SELECT value FROM v$parameter WHERE name = 'audit_trail'",
    risk: 'High',
    fixType: 'Quick',
    remediation: "Set 'audit_trail=DB,EXTENDED' in init.ora or spfile",
  },
  {
    id: '2.1',
    description: 'Password complexity enforced',
    query:
      'SELECT profile, resource_name, limit FROM dba_profiles ' +
      "WHERE resource_name = 'PASSWORD_VERIFY_FUNCTION'",
    risk: 'Medium',
    fixType: 'Planned',
    remediation: 'Assign strong password functions to user profiles',
  },
  {
    id: '3.1',
    description: 'DBA role misuse',
    query: "SELECT grantee FROM dba_role_privs WHERE granted_role = 'DBA'",
    risk: 'High',
    fixType: 'Involved',
    remediation: 'Limit DBA role assignment to only authorized users',
  },
  {
    id: '4.1',
    description: 'Failed login audit check',
    query:
      'SELECT username, timestamp, returncode FROM dba_audit_session ' +
      'WHERE returncode != 0 AND ROWNUM <= 5',
    risk: 'Medium',
    fixType: 'Quick',
    remediation: 'Enable audit for session logon failures',
  },
  {
    id: '5.1',
    description: 'Check for default user accounts',
    query:
      'SELECT username, account_status FROM dba_users ' +
      "WHERE username IN ('SCOTT','HR','OUTLN')",
    risk: 'Low',
    fixType: 'Quick',
    remediation: 'Lock/remove unused default accounts',
  },
]);

export function freezeCatalog(checks: CheckDescriptor[]): readonly CheckDescriptor[] {
  return Object.freeze(checks.map((check) => Object.freeze({ ...check })));
}
