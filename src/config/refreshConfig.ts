/**
 * Refresh configuration: environment variables parsed and validated with zod.
 *
 * Empty strings count as unset. Durations are given in seconds and exposed in ms.
 */

import { z } from 'zod';
import { LOG_LEVELS, LogLevel } from '../services/core/Logger';
import { ConfigurationError } from '../types/RefreshErrors';

export const DEFAULT_RETRY_LIMIT = 3;
export const DEFAULT_POLL_INTERVAL_SECONDS = 120;
export const DEFAULT_RETRY_DELAY_SECONDS = 120;

type Env = Record<string, string | undefined>;

const optionalString = z.preprocess(
  (value) => (value === '' ? undefined : value),
  z.string().optional()
);

const requiredString = (name: string) =>
  z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.string({ required_error: `${name} is required` }).min(1)
  );

const positiveInt = (fallback: number) =>
  z.preprocess(
    (value) => (value === '' || value === undefined ? fallback : value),
    z.coerce.number().int().positive()
  );

const nonNegativeInt = (fallback: number) =>
  z.preprocess(
    (value) => (value === '' || value === undefined ? fallback : value),
    z.coerce.number().int().min(0)
  );

const timeOfDay = (name: string) =>
  requiredString(name).pipe(z.string().regex(/^\d{1,2}:\d{2}$/, `${name} must be HH:MM`));

const commaList = z.preprocess(
  (value) => (typeof value === 'string' ? value : ''),
  z.string().transform((value) =>
    value
      .split(',')
      .map((item) => item.trim())
      .filter((item) => item.length > 0)
  )
);

const AuditEnvSchema = z.object({
  AWS_REGION: optionalString,
  ENV: z.preprocess((value) => (value === '' ? undefined : value), z.string().default('dev')),
  JOB_NAME: z.preprocess((value) => (value === '' ? undefined : value), z.string().default('report-refresh')),
  AUDIT_DB_RESOURCE_ARN: requiredString('AUDIT_DB_RESOURCE_ARN'),
  AUDIT_DB_SECRET_ARN: requiredString('AUDIT_DB_SECRET_ARN'),
  AUDIT_DB_NAME: requiredString('AUDIT_DB_NAME'),
  OPS_TOPIC_ARN: requiredString('OPS_TOPIC_ARN'),
  REPORT_LABEL: optionalString,
  AWS_LAMBDA_LOG_GROUP_NAME: optionalString,
  LOG_LEVEL: z.preprocess(
    (value) => (typeof value === 'string' && value !== '' ? value.toLowerCase() : undefined),
    z.enum(LOG_LEVELS).default('info')
  ),
});

const RefreshEnvSchema = AuditEnvSchema.extend({
  REDSHIFT_CLUSTER_IDENTIFIER: optionalString,
  REDSHIFT_WORKGROUP_NAME: optionalString,
  REDSHIFT_DATABASE: requiredString('REDSHIFT_DATABASE'),
  REDSHIFT_SECRET_ARN: requiredString('REDSHIFT_SECRET_ARN'),
  USERS_TOPIC_ARN: optionalString,
  REPORT_URL: optionalString,
  DATASOURCE_FILTER_MODE: z.preprocess(
    (value) => (value === '' ? undefined : value),
    z.enum(['include', 'exclude']).default('include')
  ),
  DATASOURCE_PATTERN: requiredString('DATASOURCE_PATTERN'),
  RETRY_LIMIT: positiveInt(DEFAULT_RETRY_LIMIT),
  POLL_INTERVAL_SECONDS: positiveInt(DEFAULT_POLL_INTERVAL_SECONDS),
  RETRY_DELAY_SECONDS: nonNegativeInt(DEFAULT_RETRY_DELAY_SECONDS),
}).refine(
  (env) => Boolean(env.REDSHIFT_CLUSTER_IDENTIFIER || env.REDSHIFT_WORKGROUP_NAME),
  { message: 'REDSHIFT_CLUSTER_IDENTIFIER or REDSHIFT_WORKGROUP_NAME is required', path: ['REDSHIFT_CLUSTER_IDENTIFIER'] }
);

const TriggerEnvSchema = AuditEnvSchema.extend({
  REPORT_REGION: requiredString('REPORT_REGION'),
  REPORT_SOURCE: requiredString('REPORT_SOURCE'),
  DEPENDENT_REGIONS: commaList,
  CUTOFF_START: timeOfDay('CUTOFF_START'),
  CUTOFF_END: timeOfDay('CUTOFF_END'),
  CUTOFF_GRACE_MINUTES: nonNegativeInt(0),
  LANDING_BUCKET: requiredString('LANDING_BUCKET'),
  METADATA_PREFIX: optionalString,
  EVENT_BUS_NAME: z.preprocess((value) => (value === '' ? undefined : value), z.string().default('default')),
});

export interface AuditConnectionConfig {
  awsRegion?: string;
  env: string;
  jobName: string;
  reportLabel?: string;
  logGroup?: string;
  logLevel: LogLevel;
  operatorsTopicArn: string;
  audit: {
    resourceArn: string;
    secretArn: string;
    database: string;
  };
}

export interface RefreshConfig extends AuditConnectionConfig {
  redshift: {
    clusterIdentifier?: string;
    workgroupName?: string;
    database: string;
    secretArn: string;
  };
  usersTopicArn?: string;
  reportUrl?: string;
  dataSourceFilter: {
    mode: 'include' | 'exclude';
    pattern: string;
  };
  retryLimit: number;
  pollIntervalMs: number;
  retryDelayMs: number;
}

export interface TriggerConfig extends AuditConnectionConfig {
  region: string;
  reportSource: string;
  dependentRegions: string[];
  cutoff: {
    cutoffStart: string;
    cutoffEnd: string;
    graceMinutes: number;
  };
  landingBucket: string;
  metadataPrefix?: string;
  eventBusName: string;
}

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    .join('; ');
}

export function loadRefreshConfig(env: Env = process.env): RefreshConfig {
  const parsed = RefreshEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid refresh configuration: ${formatIssues(parsed.error)}`);
  }
  const values = parsed.data;
  return {
    awsRegion: values.AWS_REGION,
    env: values.ENV,
    jobName: values.JOB_NAME,
    reportLabel: values.REPORT_LABEL,
    logGroup: values.AWS_LAMBDA_LOG_GROUP_NAME,
    logLevel: values.LOG_LEVEL,
    operatorsTopicArn: values.OPS_TOPIC_ARN,
    audit: {
      resourceArn: values.AUDIT_DB_RESOURCE_ARN,
      secretArn: values.AUDIT_DB_SECRET_ARN,
      database: values.AUDIT_DB_NAME,
    },
    redshift: {
      clusterIdentifier: values.REDSHIFT_CLUSTER_IDENTIFIER,
      workgroupName: values.REDSHIFT_WORKGROUP_NAME,
      database: values.REDSHIFT_DATABASE,
      secretArn: values.REDSHIFT_SECRET_ARN,
    },
    usersTopicArn: values.USERS_TOPIC_ARN,
    reportUrl: values.REPORT_URL,
    dataSourceFilter: {
      mode: values.DATASOURCE_FILTER_MODE,
      pattern: values.DATASOURCE_PATTERN,
    },
    retryLimit: values.RETRY_LIMIT,
    pollIntervalMs: values.POLL_INTERVAL_SECONDS * 1000,
    retryDelayMs: values.RETRY_DELAY_SECONDS * 1000,
  };
}

export function loadTriggerConfig(env: Env = process.env): TriggerConfig {
  const parsed = TriggerEnvSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigurationError(`Invalid trigger configuration: ${formatIssues(parsed.error)}`);
  }
  const values = parsed.data;
  return {
    awsRegion: values.AWS_REGION,
    env: values.ENV,
    jobName: values.JOB_NAME,
    reportLabel: values.REPORT_LABEL,
    logGroup: values.AWS_LAMBDA_LOG_GROUP_NAME,
    logLevel: values.LOG_LEVEL,
    operatorsTopicArn: values.OPS_TOPIC_ARN,
    audit: {
      resourceArn: values.AUDIT_DB_RESOURCE_ARN,
      secretArn: values.AUDIT_DB_SECRET_ARN,
      database: values.AUDIT_DB_NAME,
    },
    region: values.REPORT_REGION,
    reportSource: values.REPORT_SOURCE,
    dependentRegions: values.DEPENDENT_REGIONS,
    cutoff: {
      cutoffStart: values.CUTOFF_START,
      cutoffEnd: values.CUTOFF_END,
      graceMinutes: values.CUTOFF_GRACE_MINUTES,
    },
    landingBucket: values.LANDING_BUCKET,
    metadataPrefix: values.METADATA_PREFIX,
    eventBusName: values.EVENT_BUS_NAME,
  };
}
