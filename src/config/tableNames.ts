const selectFirstValue = (...candidates: Array<string | undefined | null>): string | null => {
  for (const candidate of candidates) {
    if (typeof candidate === 'string') {
      const trimmed = candidate.trim();
      if (trimmed.length > 0) {
        return trimmed;
      }
    }
  }
  return null;
};

const normalizeEnvName = (value: string) => {
  const trimmed = value.trim();
  return trimmed.length > 0 ? trimmed : 'dev';
};

const environment = normalizeEnvName(process.env.ENVIRONMENT || process.env.STAGE || 'dev');
const tablePrefix = (process.env.TABLE_NAME_PREFIX || 'copilot').trim();

const buildCanonicalName = (suffix: string) => {
  const prefixSegment = tablePrefix.length > 0 ? `${tablePrefix}-` : '';
  return `${prefixSegment}${environment}-${suffix}`;
};

const resolveTableName = (suffix: string, ...candidates: Array<string | undefined | null>): string =>
  selectFirstValue(...candidates) ?? buildCanonicalName(suffix);

export const TABLE_NAMES = {
  USERS: resolveTableName('users', process.env.USERS_TABLE),
  COPILOTS: resolveTableName('copilots', process.env.COPILOTS_TABLE)
};

export const INDEX_NAMES = {
  USERS_BY_EMAIL: process.env.USERS_EMAIL_INDEX || 'EmailIndex'
};
