export type Volume = {
  /** 目前的掛載路徑，例如 `E:\` 或 `/media/user/PHOTOS` */
  mountPath: string;
  /** 使用者命名的磁碟區標籤，磁碟代號改變時仍可用來找到同一顆磁碟 */
  label: string;
};

/**
 * 列出主機目前可見的磁碟區。每次呼叫都重新查詢，不做快取。
 */
export interface VolumeEnumerator {
  list(): Promise<Volume[]>;
}

export type VolumeError = {
  type: "VOLUME_NOT_FOUND";
  message: string;
};
