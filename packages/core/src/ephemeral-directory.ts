import { mkdtempSync, rmSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { createWdomError, describeError } from "./errors.js";
import { createLogger } from "./utils/logging.js";

type Releaser = {
  path: string;
  released: boolean;
};

const logger = createLogger("resource");

const reclaimer = new FinalizationRegistry<Releaser>((releaser) => {
  releaseDirectory(releaser);
});

/**
 * Scratch directory whose lifetime follows its owner.
 *
 * `dispose()` removes it right away. If the owner is collected first, the directory is
 * removed by the finalizer instead; either way removal happens once.
 */
export class EphemeralDirectory {
  private readonly releaser: Releaser;

  constructor(owner: object, prefix = "wdom-") {
    this.releaser = { path: mkdtempSync(join(tmpdir(), prefix)), released: false };
    reclaimer.register(owner, this.releaser, this.releaser);
  }

  get path(): string {
    return this.releaser.path;
  }

  get released(): boolean {
    return this.releaser.released;
  }

  dispose(): void {
    reclaimer.unregister(this.releaser);
    releaseDirectory(this.releaser);
  }
}

function releaseDirectory(releaser: Releaser): void {
  if (releaser.released) {
    return;
  }
  releaser.released = true;
  try {
    rmSync(releaser.path, { recursive: true, force: true });
    logger.debug("removed temporary directory", { path: releaser.path });
  } catch (error) {
    const failure = createWdomError("resource", describeError(error), { path: releaser.path });
    logger.warn("failed to remove temporary directory", { ...failure });
  }
}
