import { access, cp, mkdir, rename, rm } from "node:fs/promises";
import type { FilesystemOperator } from "@steward/sdk";
import { FilesystemError } from "./lifecycle-errors.js";

export class NodeFilesystemOperator implements FilesystemOperator {
  public async rename(source: string, destination: string): Promise<void> {
    try {
      await rename(source, destination);
    } catch (error) {
      throw new FilesystemError("rename", [source, destination], error);
    }
  }

  public async remove(target: string): Promise<void> {
    try {
      await rm(target, { recursive: true, force: true });
    } catch (error) {
      throw new FilesystemError("remove", [target], error);
    }
  }

  public async copy(source: string, destination: string): Promise<void> {
    try {
      await cp(source, destination, { recursive: true, errorOnExist: true, force: false });
    } catch (error) {
      throw new FilesystemError("copy", [source, destination], error);
    }
  }

  public async ensureDirectory(target: string): Promise<void> {
    try {
      await mkdir(target, { recursive: true });
    } catch (error) {
      throw new FilesystemError("mkdir", [target], error);
    }
  }

  public async exists(target: string): Promise<boolean> {
    try {
      await access(target);
      return true;
    } catch {
      return false;
    }
  }
}
