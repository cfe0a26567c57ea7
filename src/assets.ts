import { existsSync, statSync } from "node:fs";
import path from "node:path";

import type { ImageKey } from "./weather/classifier.js";

export class ImageAssets {
  public constructor(private readonly dir: string) {}

  /** Absolute path of `<key>.png`, or undefined when the file is not there. */
  public resolve(key: ImageKey): string | undefined {
    const file = path.resolve(this.dir, `${key}.png`);
    return existsSync(file) && statSync(file).isFile() ? file : undefined;
  }
}
