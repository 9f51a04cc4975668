import fs from "fs";
import { z } from "zod";
import * as yaml from "yaml";
import { CatalogLoadError, MalformedSignatureError } from "../errors.js";

const BugSchema = z
  .object({
    url: z.string()
  })
  .strict();

const SignatureEntrySchema = z
  .object({
    patterns: z.array(z.string()).optional(),
    literals: z.array(z.string()).optional(),
    bug: BugSchema.optional()
  })
  .strict();

// `name:` with no body is an empty signature, not an error
const CatalogSourceSchema = z.record(SignatureEntrySchema.nullable());

export type SignatureEntry = z.infer<typeof SignatureEntrySchema>;
export type BugMetadata = z.infer<typeof BugSchema>;

export type SignatureRule =
  | { kind: "regex"; source: string; pattern: RegExp }
  | { kind: "literal"; text: string };

export interface Signature {
  name: string;
  patterns: readonly string[];
  literals: readonly string[];
  bug?: BugMetadata;
  /** Regex rules first, then literal rules, each in declaration order. */
  rules: readonly SignatureRule[];
}

/**
 * Immutable set of named failure signatures, in declaration order.
 */
export class SignatureCatalog {
  private readonly byName: ReadonlyMap<string, Signature>;

  constructor(readonly signatures: readonly Signature[]) {
    const byName = new Map<string, Signature>();
    for (const signature of signatures) {
      if (byName.has(signature.name)) {
        throw new CatalogLoadError(`Duplicate signature name: ${signature.name}`);
      }
      byName.set(signature.name, signature);
    }
    this.byName = byName;
  }

  get size(): number {
    return this.signatures.length;
  }

  lookup(name: string): Signature | undefined {
    return this.byName.get(name);
  }

  names(): string[] {
    return this.signatures.map(s => s.name);
  }
}

export function compileSignature(name: string, entry: SignatureEntry | null): Signature {
  const patterns = entry?.patterns ?? [];
  const literals = entry?.literals ?? [];
  const rules: SignatureRule[] = [];

  for (const source of patterns) {
    try {
      // "s": stack traces and multi-line error blocks are common targets
      rules.push({ kind: "regex", source, pattern: new RegExp(source, "s") });
    } catch (error) {
      throw new MalformedSignatureError(name, source, { cause: error });
    }
  }
  for (const text of literals) {
    rules.push({ kind: "literal", text });
  }

  const signature: Signature = { name, patterns, literals, rules };
  if (entry?.bug) {
    signature.bug = { url: entry.bug.url };
  }
  return signature;
}

/**
 * Parse a catalog from YAML (or JSON) text.
 *
 * Duplicate signature names are rejected by the YAML parser's unique-key
 * check rather than silently resolved.
 */
export function parseCatalog(source: string, origin = "catalog"): SignatureCatalog {
  let data: unknown;
  try {
    // an empty or comment-only file is an empty catalog
    data = yaml.parse(source) ?? {};
  } catch (error) {
    const detail = error instanceof Error ? error.message : String(error);
    throw new CatalogLoadError(`Unable to parse ${origin}: ${detail}`, { cause: error });
  }

  const result = CatalogSourceSchema.safeParse(data);
  if (!result.success) {
    const issues = result.error.errors
      .map(err => `${err.path.join(".") || "(root)"}: ${err.message}`)
      .join("; ");
    throw new CatalogLoadError(`Invalid ${origin}: ${issues}`, { cause: result.error });
  }

  const signatures = Object.entries(result.data).map(([name, entry]) =>
    compileSignature(name, entry)
  );
  return new SignatureCatalog(signatures);
}

/**
 * Load the signature catalog from disk. Called once per process.
 */
export function loadCatalog(filePath: string): SignatureCatalog {
  let content: string;
  try {
    content = fs.readFileSync(filePath, "utf-8");
  } catch (error) {
    throw new CatalogLoadError(`Catalog file not found: ${filePath}`, { cause: error });
  }
  return parseCatalog(content, filePath);
}

/**
 * Serialize a catalog back into its source format.
 */
export function serializeCatalog(catalog: SignatureCatalog): string {
  const document: Record<string, SignatureEntry> = {};
  for (const signature of catalog.signatures) {
    const entry: SignatureEntry = {};
    if (signature.patterns.length) entry.patterns = [...signature.patterns];
    if (signature.literals.length) entry.literals = [...signature.literals];
    if (signature.bug) entry.bug = { url: signature.bug.url };
    document[signature.name] = entry;
  }
  return yaml.stringify(document);
}
