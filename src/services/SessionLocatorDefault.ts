import { cp, mkdir, readdir, rename } from "node:fs/promises";
import path from "node:path";

import type { Logger } from "~shared/Logger";
import { type Result, err, ok } from "~shared/utils/Result";

import { captureFolderName, sessionMarkerExtension } from "@/constants";
import { errorMessage, exists, isDirectory, touch } from "@/utils/helper";

import type {
  SessionError,
  SessionLocation,
  SessionLocator,
  SessionRequest,
} from "./SessionLocator";

type SessionPaths = Omit<SessionLocation, "origin">;

export class SessionLocatorDefault implements SessionLocator {
  private readonly logger: Logger;

  constructor(deps: { logger: Logger }) {
    this.logger = deps.logger.extend("SessionLocator");
  }

  async locateOrCreate(
    request: SessionRequest
  ): Promise<Result<SessionLocation, SessionError>> {
    const { year, month, sessionName } = request.segments;
    const sessionPath = path.join(
      request.destinationRoot,
      year,
      month,
      sessionName
    );
    const paths: SessionPaths = {
      sessionPath,
      capturePath: path.join(sessionPath, captureFolderName),
      markerPath: path.join(
        sessionPath,
        `${sessionName}${sessionMarkerExtension}`
      ),
    };

    try {
      if (await exists(paths.markerPath)) {
        await mkdir(paths.capturePath, { recursive: true });
        return ok({ ...paths, origin: "existing" });
      }

      const templatePath = request.templatePath;
      if (templatePath && (await isDirectory(templatePath))) {
        try {
          await this.cloneTemplate(templatePath, paths, sessionName);
          this.logger.info({
            emoji: "🗂️",
            event: "session.template",
          })`由範本建立工作階段 ${sessionPath}`;
          return ok({ ...paths, origin: "template" });
        } catch (error) {
          this.logger.warn({ error, templatePath })`複製範本失敗，改建立基本結構`;
        }
      } else if (templatePath) {
        this.logger.warn({ templatePath })`範本路徑不存在或不是資料夾，改建立基本結構`;
      }

      await this.createBasic(paths);
      this.logger.info({
        emoji: "📁",
        event: "session.basic",
      })`建立工作階段 ${sessionPath}`;
      return ok({ ...paths, origin: "basic" });
    } catch (error) {
      return err({
        type: "SESSION_FAILED",
        message: `建立工作階段失敗: ${errorMessage(error)}`,
      });
    }
  }

  private async createBasic(paths: SessionPaths) {
    await mkdir(paths.capturePath, { recursive: true });
    await touch(paths.markerPath);
  }

  /**
   * 複製整個範本資料夾，再把第一個 .cosessiondb 更名為工作階段名稱。
   * 工作階段資料夾已存在時視為失敗，不覆蓋既有內容。
   */
  private async cloneTemplate(
    templatePath: string,
    paths: SessionPaths,
    sessionName: string
  ) {
    if (await exists(paths.sessionPath)) {
      throw new Error(`工作階段資料夾已存在: ${paths.sessionPath}`);
    }
    await mkdir(path.dirname(paths.sessionPath), { recursive: true });
    await cp(templatePath, paths.sessionPath, {
      recursive: true,
      errorOnExist: true,
      force: false,
    });

    const entries = await readdir(paths.sessionPath, { withFileTypes: true });
    const marker = entries
      .filter(
        (entry) =>
          entry.isFile() &&
          entry.name.endsWith(sessionMarkerExtension)
      )
      .map((entry) => entry.name)
      .sort((a, b) => a.localeCompare(b))[0];

    if (marker) {
      const from = path.join(paths.sessionPath, marker);
      if (from !== paths.markerPath) await rename(from, paths.markerPath);
    } else {
      this.logger.warn({
        templatePath,
      })`範本中沒有 ${sessionMarkerExtension} 檔，建立空的標記檔`;
      await touch(paths.markerPath);
    }
    this.logger.debug({ sessionName })`標記檔已就緒`;

    await mkdir(paths.capturePath, { recursive: true });
  }
}
