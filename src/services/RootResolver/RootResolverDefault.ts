import path from "node:path";

import fg from "fast-glob";
import picomatch from "picomatch";

import { type Result, err, ok } from "~shared/utils/Result";

import { globSyntaxOptions } from "@/constants";
import type { ConcreteRoot, RootSpecification } from "@/types";
import {
  isHostCaseInsensitive,
  isNotFoundError,
  statIfExists,
} from "@/utils/helper";

import {
  type RootNotFoundError,
  type RootResolver,
  formatRootNotFound,
} from "./RootResolver";

export type RootResolverOptions = {
  cwd?: string;
  platform?: NodeJS.Platform;
};

export class RootResolverDefault implements RootResolver {
  private readonly cwd: string;
  private readonly platform: NodeJS.Platform;

  constructor(options: RootResolverOptions = {}) {
    this.cwd = options.cwd ?? process.cwd();
    this.platform = options.platform ?? process.platform;
  }

  async resolve(
    spec: RootSpecification
  ): Promise<Result<ConcreteRoot[], RootNotFoundError>> {
    const roots =
      spec.kind === "pattern" &&
      fg.isDynamicPattern(this.toGlob(spec.text), this.globOptions())
        ? await this.expand(spec.text)
        : await this.lookup(spec.text);

    if (roots.length === 0) {
      return err({
        type: "ROOT_NOT_FOUND",
        spec,
        message: formatRootNotFound(spec),
      });
    }
    return ok(roots);
  }

  private async lookup(text: string): Promise<ConcreteRoot[]> {
    const absolute = path.resolve(this.cwd, text);
    const stats = await statIfExists(absolute);
    return stats ? [{ path: absolute, isDirectory: stats.isDirectory() }] : [];
  }

  private async expand(text: string): Promise<ConcreteRoot[]> {
    const glob = this.toGlob(text);
    let matches: string[];
    try {
      matches = await fg(glob, {
        ...this.globOptions(),
        cwd: this.cwd,
        absolute: true,
        onlyFiles: false,
        dot: true,
        followSymbolicLinks: false,
        suppressErrors: false,
      });
    } catch (error) {
      // 基底路徑中間是檔案（ENOTDIR）也視為不存在
      if (isNotFoundError(error)) return [];
      throw error;
    }

    // fast-glob 會把與樣式字面相同的名稱也算進來，例如 x[1]，用正規式再篩一次
    const re = picomatch.makeRe(this.absoluteGlob(glob), {
      ...globSyntaxOptions,
      nocase: isHostCaseInsensitive(this.platform),
    });

    const roots: ConcreteRoot[] = [];
    for (const match of matches) {
      if (!re.test(this.toGlob(match))) continue;
      // 展開後到 stat 之間被刪除的項目直接略過
      const stats = await statIfExists(match);
      if (stats) {
        roots.push({
          path: path.normalize(match),
          isDirectory: stats.isDirectory(),
        });
      }
    }
    return roots;
  }

  private globOptions() {
    return {
      braceExpansion: false,
      extglob: false,
      caseSensitiveMatch: !isHostCaseInsensitive(this.platform),
    };
  }

  private absoluteGlob(glob: string) {
    if (path.posix.isAbsolute(glob) || /^[A-Za-z]:\//.test(glob)) return glob;
    return path.posix.join(fg.escapePath(this.toGlob(this.cwd)), glob);
  }

  private toGlob(text: string) {
    return this.platform === "win32" ? text.replace(/\\/g, "/") : text;
  }
}
