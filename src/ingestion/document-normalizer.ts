/**
 * Attaches provenance metadata to fetched documents.
 *
 * @module ingestion/document-normalizer
 */

import type { Document, DocumentMetadata, NormalizationContext } from "./types.js";

/**
 * Build the standard metadata, then apply caller fields over it.
 *
 * Caller keys win on collision.
 */
export function buildDocumentMetadata(context: NormalizationContext): DocumentMetadata {
  return {
    owner: context.owner,
    repo: context.repo,
    branch: context.branch,
    namespace: context.namespace,
    ...context.extraMetadata,
  };
}

/**
 * Return copies of the documents with metadata set to exactly
 * `{owner, repo, branch, namespace, ...extraMetadata}`.
 *
 * Inputs are not mutated; text, id and path are carried over.
 */
export function normalizeDocuments(
  documents: readonly Document[],
  context: NormalizationContext
): Document[] {
  return documents.map((document) => ({
    ...document,
    metadata: buildDocumentMetadata(context),
  }));
}
