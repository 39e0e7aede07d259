/**
 * XML bodies exchanged with the blob service.
 *
 * Responses are parsed with fast-xml-parser and then checked against zod
 * schemas, so a malformed body surfaces as a `StorageError` instead of a
 * half-filled result.
 *
 * @module blobs/xml
 */

import { XMLBuilder, XMLParser } from 'fast-xml-parser';
import { z } from 'zod';
import { StorageError, type ServiceErrorDetail } from '../errors/index.js';
import type { BlockItem, BlockListEntry, PageRange } from './models.js';

/** Elements that always parse to arrays, even when only one is present */
const ARRAY_ELEMENTS = new Set(['Block', 'PageRange', 'ClearRange']);

/**
 * Parser options for blob service XML
 */
const PARSER_OPTIONS = {
  ignoreAttributes: true,
  ignoreDeclaration: true,
  parseTagValue: false,
  trimValues: true,
  isArray: (name: string) => ARRAY_ELEMENTS.has(name),
};

/**
 * Builder options for request bodies
 */
const BUILDER_OPTIONS = {
  ignoreAttributes: true,
  format: false,
  preserveOrder: true,
  suppressEmptyNode: false,
};

const XML_DECLARATION = '<?xml version="1.0" encoding="utf-8"?>';

const emptyElement = z.literal('');

const blockSchema = z.object({ Name: z.string(), Size: z.string().regex(/^\d+$/) });
const blocksSchema = z.union([emptyElement, z.object({ Block: z.array(blockSchema).optional() })]).optional();

const blockListSchema = z.object({
  BlockList: z.union([
    emptyElement,
    z.object({
      CommittedBlocks: blocksSchema,
      UncommittedBlocks: blocksSchema,
    }),
  ]),
});

const rangeSchema = z.object({ Start: z.string().regex(/^\d+$/), End: z.string().regex(/^\d+$/) });

const pageListSchema = z.object({
  PageList: z.union([
    emptyElement,
    z.object({
      PageRange: z.array(rangeSchema).optional(),
      ClearRange: z.array(rangeSchema).optional(),
    }),
  ]),
});

const errorSchema = z.object({
  Error: z.object({
    Code: z.string().optional(),
    Message: z.string().optional(),
  }),
});

function parseDocument(xml: string, what: string): unknown {
  try {
    return new XMLParser(PARSER_OPTIONS).parse(xml);
  } catch (error) {
    throw new StorageError({
      message: `Failed to parse ${what}: ${error instanceof Error ? error.message : String(error)}`,
      code: 'InvalidXml',
      cause: error instanceof Error ? error : undefined,
    });
  }
}

function invalid(what: string, issues: z.ZodIssue[]): StorageError {
  const detail = issues.map((i) => `${i.path.join('.')}: ${i.message}`).join(', ');
  return new StorageError({ message: `Unexpected ${what}: ${detail}`, code: 'InvalidXml' });
}

function toBlocks(value: z.infer<typeof blocksSchema>): BlockItem[] {
  if (!value) {
    return [];
  }
  return (value.Block ?? []).map((block) => ({ name: block.Name, size: Number.parseInt(block.Size, 10) }));
}

/**
 * Parse a `Get Block List` response body.
 */
export function parseBlockList(xml: string): { committedBlocks: BlockItem[]; uncommittedBlocks: BlockItem[] } {
  const result = blockListSchema.safeParse(parseDocument(xml, 'block list'));
  if (!result.success) {
    throw invalid('block list', result.error.issues);
  }
  const list = result.data.BlockList;
  if (list === '') {
    return { committedBlocks: [], uncommittedBlocks: [] };
  }
  return {
    committedBlocks: toBlocks(list.CommittedBlocks),
    uncommittedBlocks: toBlocks(list.UncommittedBlocks),
  };
}

function toRanges(ranges: z.infer<typeof rangeSchema>[] | undefined): PageRange[] {
  return (ranges ?? []).map((range) => {
    const start = Number.parseInt(range.Start, 10);
    const end = Number.parseInt(range.End, 10);
    return { offset: start, length: end - start + 1 };
  });
}

/**
 * Parse a `Get Page Ranges` response body.
 */
export function parsePageList(xml: string): { pageRanges: PageRange[]; clearRanges: PageRange[] } {
  const result = pageListSchema.safeParse(parseDocument(xml, 'page list'));
  if (!result.success) {
    throw invalid('page list', result.error.issues);
  }
  const list = result.data.PageList;
  if (list === '') {
    return { pageRanges: [], clearRanges: [] };
  }
  return { pageRanges: toRanges(list.PageRange), clearRanges: toRanges(list.ClearRange) };
}

/**
 * Extract code and message from an error response body.
 *
 * Bodies that are empty or not service error documents yield an empty detail.
 */
export function parseErrorBody(body: string): ServiceErrorDetail {
  if (body.trim() === '') {
    return {};
  }
  let document: unknown;
  try {
    document = new XMLParser(PARSER_OPTIONS).parse(body);
  } catch {
    return {};
  }
  const result = errorSchema.safeParse(document);
  if (!result.success) {
    return {};
  }
  return { code: result.data.Error.Code, message: result.data.Error.Message };
}

const BLOCK_ELEMENT: Record<BlockListEntry['list'], string> = {
  committed: 'Committed',
  uncommitted: 'Uncommitted',
  latest: 'Latest',
};

/**
 * Build a `Put Block List` request body.
 *
 * Entries keep their order; each lands in the element for its source list.
 */
export function buildBlockList(entries: readonly BlockListEntry[]): string {
  const builder = new XMLBuilder(BUILDER_OPTIONS);
  const body: string = builder.build([
    { BlockList: entries.map((entry) => ({ [BLOCK_ELEMENT[entry.list]]: [{ '#text': entry.id }] })) },
  ]);
  return `${XML_DECLARATION}${body}`;
}
