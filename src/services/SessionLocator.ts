import type { Result } from "~shared/utils/Result";

import type { SessionSegments } from "./SessionPathBuilder";

/**
 * - existing：標記檔已存在，直接沿用
 * - template：由範本資料夾複製建立
 * - basic：只建立 Capture 資料夾與空的標記檔
 */
export type SessionOrigin = "existing" | "template" | "basic";

export type SessionLocation = {
  sessionPath: string;
  capturePath: string;
  markerPath: string;
  origin: SessionOrigin;
};

export type SessionRequest = {
  destinationRoot: string;
  segments: SessionSegments;
  /** 空字串代表未設定範本 */
  templatePath: string;
};

export type SessionError = {
  type: "SESSION_FAILED";
  message: string;
};

export interface SessionLocator {
  /**
   * 找出或建立 root/year/month/session 工作階段資料夾。
   * 標記檔存在即視為已建立，不會重新複製範本或改動標記檔。
   */
  locateOrCreate(
    request: SessionRequest
  ): Promise<Result<SessionLocation, SessionError>>;
}
