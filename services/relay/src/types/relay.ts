export type ContentKey = string;
export type ChatId = number | string;

export interface OriginLocation {
  chatId: ChatId;
  messageId: number;
}

export type MessageHandle = OriginLocation;

export interface DeliveryCacheEntry {
  contentKey: ContentKey;
  blobHandle: string;
  origin: OriginLocation;
  title: string;
}

export interface LocalArtifactEntry {
  contentKey: ContentKey;
  filePath: string;
  createdAtMs: number;
  title: string;
  durationSeconds: number;
}

export type DeliveryTable = Record<ContentKey, DeliveryCacheEntry>;
export type LocalTable = Record<ContentKey, LocalArtifactEntry>;

export interface CacheTables {
  delivery: DeliveryTable;
  local: LocalTable;
}

export type TableName = keyof CacheTables;

export interface MediaFile {
  title: string;
  filePath: string;
  durationSeconds: number;
}

export interface CollectionItem {
  key: ContentKey;
  title: string;
  durationSeconds: number;
}

export interface DeliveryReceipt {
  blobHandle: string;
  origin: OriginLocation;
}

export type AudioSource =
  | { kind: 'file'; path: string }
  | { kind: 'blob'; blobHandle: string };

export interface AudioMetadata {
  title: string;
  durationSeconds?: number;
  attribution?: string;
}

export interface Messenger {
  readonly name: string;
  forward(destination: ChatId, origin: OriginLocation): Promise<void>;
  sendAudio(destination: ChatId, source: AudioSource, metadata: AudioMetadata): Promise<DeliveryReceipt>;
  sendText(destination: ChatId, text: string): Promise<MessageHandle>;
  editText(handle: MessageHandle, text: string): Promise<void>;
  deleteText(handle: MessageHandle): Promise<void>;
}

export interface FetchMediaOptions {
  outputPath: string;
}

export interface MediaSource {
  readonly name: string;
  fetchMedia(key: ContentKey, options: FetchMediaOptions): Promise<MediaFile>;
  listCollection(key: ContentKey): Promise<CollectionItem[]>;
}

export type ResolveOutcome =
  | { kind: 'delivery-cache'; via: 'forward' | 'blob' }
  | { kind: 'local-cache' }
  | { kind: 'fetched' }
  | { kind: 'failed'; reason: string };

export type LocalRetentionPolicy = 'ttl' | 'deliver-once';
