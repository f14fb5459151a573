import {
  CREATE_AUDIT_LOG,
  CREATE_AUDIT_LOG_INDEXES,
  CREATE_CREDENTIALS,
  CREATE_FAILED_ATTEMPTS,
  CREATE_FAILED_ATTEMPTS_INDEXES,
  CREATE_PRINCIPALS,
  CREATE_SESSIONS,
  CREATE_SESSIONS_INDEXES,
  CREATE_STORE_META,
} from "../schema.js";

export interface Migration {
  version: number;
  up: string;
}

export const migration001: Migration = {
  version: 1,
  up: [
    CREATE_STORE_META,
    CREATE_PRINCIPALS,
    CREATE_CREDENTIALS,
    CREATE_AUDIT_LOG,
    CREATE_AUDIT_LOG_INDEXES,
    CREATE_FAILED_ATTEMPTS,
    CREATE_FAILED_ATTEMPTS_INDEXES,
    CREATE_SESSIONS,
    CREATE_SESSIONS_INDEXES,
  ].join("\n"),
};
