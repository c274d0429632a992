import { z } from 'zod';

export const COLLECTION_VERSION = '1';
export const REQUEST_URL_TEMPLATE = '{{baseUrl}}/api/validate/{{tc_id}}';
export const REQUEST_METHOD = 'POST';

export const RequestHeaderSchema = z.object({
  uid: z.string().min(1),
  name: z.string().min(1),
  value: z.string(),
  enabled: z.boolean(),
});

export const RequestItemSchema = z.object({
  uid: z.string().min(1),
  name: z.string().min(1),
  type: z.literal('http'),
  method: z.string().min(1),
  url: z.string().min(1),
  headers: z.array(RequestHeaderSchema),
  body: z.object({
    mode: z.literal('raw'),
    raw: z.string(),
  }),
});

export const CollectionDocumentSchema = z.object({
  version: z.string(),
  name: z.string(),
  type: z.literal('collection'),
  items: z.array(RequestItemSchema),
});

export type RequestHeader = z.infer<typeof RequestHeaderSchema>;
export type CollectionDocument = z.infer<typeof CollectionDocumentSchema>;

export interface RequestDescriptor {
  uid: string;
  name: string;
  method: string;
  url: string;
  headers: RequestHeader[];
  bodyRaw: string;
}

export interface Collection {
  name: string;
  items: RequestDescriptor[];
}
