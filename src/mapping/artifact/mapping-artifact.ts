import { mkdir, readFile, writeFile } from 'node:fs/promises';
import { dirname } from 'node:path';
import { z } from 'zod';
import { compareCodePoints } from '../../common/compare';
import {
  MappingArtifactError,
  formatErrorMessage,
  isMissingFile,
} from '../../common/errors';
import {
  CanonicalMappingEntry,
  DESCRIPTION_TIERS,
  POINT_CATEGORIES,
} from '../interfaces/canonical-mapping.interface';

export const ARTIFACT_SCHEMA_VERSION = 1;

const CanonicalMappingEntrySchema = z
  .object({
    canonicalName: z.string().min(1),
    models: z.array(z.string().min(1)).min(1),
    vendorOnly: z.boolean(),
    vsn300Name: z.string().min(1).optional(),
    vsn700Name: z.string().min(1).optional(),
    label: z.string(),
    description: z.string(),
    descriptionSource: z.enum(DESCRIPTION_TIERS),
    displayName: z.string(),
    category: z.enum(POINT_CATEGORIES),
    unit: z.string(),
    deviceClass: z.string().optional(),
    stateClass: z.string().optional(),
    entityCategory: z.literal('diagnostic').optional(),
    icon: z.string().optional(),
    inVsn300Feed: z.boolean(),
    inVsn700Feed: z.boolean(),
    availableInWireProtocol: z.boolean(),
    needsReview: z.boolean(),
  })
  .strict();

const MappingArtifactSchema = z
  .object({
    schemaVersion: z.literal(ARTIFACT_SCHEMA_VERSION),
    rulesVersion: z.string().min(1),
    pointCount: z.number().int().nonnegative(),
    points: z.array(CanonicalMappingEntrySchema),
  })
  .superRefine((artifact, ctx) => {
    if (artifact.pointCount !== artifact.points.length) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        path: ['pointCount'],
        message: `declares ${artifact.pointCount} points, contains ${artifact.points.length}`,
      });
    }
    const seen = new Set<string>();
    artifact.points.forEach((point, index) => {
      if (seen.has(point.canonicalName)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ['points', index, 'canonicalName'],
          message: `duplicate canonical name '${point.canonicalName}'`,
        });
      }
      seen.add(point.canonicalName);
    });
  });

export interface MappingArtifact {
  schemaVersion: typeof ARTIFACT_SCHEMA_VERSION;
  rulesVersion: string;
  pointCount: number;
  points: CanonicalMappingEntry[];
}

/**
 * Fixed field order so that equal entries serialize to equal bytes
 */
function orderEntryFields(entry: CanonicalMappingEntry): CanonicalMappingEntry {
  return {
    canonicalName: entry.canonicalName,
    models: [...entry.models],
    vendorOnly: entry.vendorOnly,
    ...(entry.vsn300Name !== undefined ? { vsn300Name: entry.vsn300Name } : {}),
    ...(entry.vsn700Name !== undefined ? { vsn700Name: entry.vsn700Name } : {}),
    label: entry.label,
    description: entry.description,
    descriptionSource: entry.descriptionSource,
    displayName: entry.displayName,
    category: entry.category,
    unit: entry.unit,
    ...(entry.deviceClass !== undefined ? { deviceClass: entry.deviceClass } : {}),
    ...(entry.stateClass !== undefined ? { stateClass: entry.stateClass } : {}),
    ...(entry.entityCategory !== undefined
      ? { entityCategory: entry.entityCategory }
      : {}),
    ...(entry.icon !== undefined ? { icon: entry.icon } : {}),
    inVsn300Feed: entry.inVsn300Feed,
    inVsn700Feed: entry.inVsn700Feed,
    availableInWireProtocol: entry.availableInWireProtocol,
    needsReview: entry.needsReview,
  };
}

export function createArtifact(
  entries: readonly CanonicalMappingEntry[],
  rulesVersion: string,
): MappingArtifact {
  const points = [...entries]
    .sort((a, b) => compareCodePoints(a.canonicalName, b.canonicalName))
    .map(orderEntryFields);
  return {
    schemaVersion: ARTIFACT_SCHEMA_VERSION,
    rulesVersion,
    pointCount: points.length,
    points,
  };
}

/**
 * Stable JSON: two-space indent and a trailing newline, no timestamps
 */
export function serializeArtifact(artifact: MappingArtifact): string {
  return `${JSON.stringify(artifact, null, 2)}\n`;
}

export function parseArtifact(json: string, artifactPath: string): MappingArtifact {
  let raw: unknown;
  try {
    raw = JSON.parse(json);
  } catch (error) {
    throw new MappingArtifactError(
      artifactPath,
      `Invalid JSON: ${formatErrorMessage(error)}`,
    );
  }

  const result = MappingArtifactSchema.safeParse(raw);
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new MappingArtifactError(
      artifactPath,
      `${issue.path.join('.') || '(root)'}: ${issue.message}`,
    );
  }
  return result.data;
}

export async function writeArtifact(
  artifactPath: string,
  artifact: MappingArtifact,
): Promise<string> {
  const content = serializeArtifact(artifact);
  await mkdir(dirname(artifactPath), { recursive: true });
  await writeFile(artifactPath, content, 'utf-8');
  return content;
}

export async function readArtifact(artifactPath: string): Promise<MappingArtifact> {
  let content: string;
  try {
    content = await readFile(artifactPath, 'utf-8');
  } catch (error) {
    throw new MappingArtifactError(
      artifactPath,
      isMissingFile(error)
        ? 'File not found; run the mapping build first'
        : `Cannot read file: ${formatErrorMessage(error)}`,
    );
  }
  return parseArtifact(content, artifactPath);
}
