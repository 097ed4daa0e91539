/**
 * Bot API getUpdates 回應格式
 *
 * 以 zod 驗證 snake_case 的 wire 資料，再轉成 camelCase 的 domain 型別。
 */

import { z } from 'zod';

export interface UrlEntity {
  kind: 'url';
  offset: number;
  length: number;
  url: string;
}

/**
 * `url` 以外的 entity（bold、mention、text_link 等）
 */
export interface AnnotationEntity {
  kind: 'annotation';
  type: string;
  offset: number;
  length: number;
}

export type MessageEntity = UrlEntity | AnnotationEntity;

export interface Message {
  messageId: number;
  text: string;
  entities: MessageEntity[];
}

export interface Update {
  updateId: number;
  message?: Message;
}

export const URL_ENTITY_TYPE = 'url';

const WireEntitySchema = z.object({
  type: z.string(),
  offset: z.number().int(),
  length: z.number().int(),
  url: z.string().optional(),
});

const WireMessageSchema = z.object({
  message_id: z.number().int(),
  text: z.string().optional(),
  entities: z.array(WireEntitySchema).optional(),
});

const WireUpdateSchema = z.object({
  update_id: z.number().int(),
  message: WireMessageSchema.nullish(),
});

const UpdatesResponseSchema = z.discriminatedUnion('ok', [
  z.object({
    ok: z.literal(true),
    result: z.array(WireUpdateSchema),
  }),
  z.object({
    ok: z.literal(false),
    error_code: z.number().int().optional(),
    description: z.string().optional(),
  }),
]);

export type WireEntity = z.infer<typeof WireEntitySchema>;
export type WireMessage = z.infer<typeof WireMessageSchema>;
export type WireUpdate = z.infer<typeof WireUpdateSchema>;

export type UpdatesResponse =
  | { ok: true; result: Update[] }
  | { ok: false; errorCode: number | null; description: string | null };

/**
 * 只有 `url` entity 帶連結；沒有 `url` 欄位時保留空字串，不從訊息文字推導
 */
function toEntity(entity: WireEntity): MessageEntity {
  if (entity.type === URL_ENTITY_TYPE) {
    return {
      kind: 'url',
      offset: entity.offset,
      length: entity.length,
      url: entity.url ?? '',
    };
  }
  return {
    kind: 'annotation',
    type: entity.type,
    offset: entity.offset,
    length: entity.length,
  };
}

export function toMessage(message: WireMessage): Message {
  return {
    messageId: message.message_id,
    text: message.text ?? '',
    entities: (message.entities ?? []).map(toEntity),
  };
}

export function toUpdate(update: WireUpdate): Update {
  return update.message
    ? { updateId: update.update_id, message: toMessage(update.message) }
    : { updateId: update.update_id };
}

export type ParseResult =
  | { success: true; data: UpdatesResponse }
  | { success: false; error: string };

/**
 * 驗證已解析的 JSON 是否符合 getUpdates 回應格式
 */
export function parseUpdatesResponse(body: unknown): ParseResult {
  const parsed = UpdatesResponseSchema.safeParse(body);
  if (!parsed.success) {
    return {
      success: false,
      error: parsed.error.issues
        .map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; '),
    };
  }

  const envelope = parsed.data;
  if (envelope.ok) {
    return { success: true, data: { ok: true, result: envelope.result.map(toUpdate) } };
  }
  return {
    success: true,
    data: {
      ok: false,
      errorCode: envelope.error_code ?? null,
      description: envelope.description ?? null,
    },
  };
}
