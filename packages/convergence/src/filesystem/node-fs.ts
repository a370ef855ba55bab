import * as fsPromises from "node:fs/promises";
import type { FileSystem } from "../types.js";

function readFile(target: string): Promise<Uint8Array>;
function readFile(target: string, encoding: "utf8"): Promise<string>;
function readFile(target: string, encoding?: "utf8"): Promise<Uint8Array | string> {
  return encoding ? fsPromises.readFile(target, encoding) : fsPromises.readFile(target);
}

export function createNodeFileSystem(): FileSystem {
  return {
    readFile,
    writeFile: (target, content) => fsPromises.writeFile(target, content),
    mkdir: (target, options) => fsPromises.mkdir(target, options),
    readdir: (target) => fsPromises.readdir(target),
    lstat: (target) => fsPromises.lstat(target),
    stat: (target) => fsPromises.stat(target),
    readlink: (target) => fsPromises.readlink(target),
    symlink: (target, linkPath) => fsPromises.symlink(target, linkPath),
    unlink: (target) => fsPromises.unlink(target),
    rm: (target, options) => fsPromises.rm(target, options),
    chmod: (target, mode) => fsPromises.chmod(target, mode),
    chown: (target, uid, gid) => fsPromises.chown(target, uid, gid),
    lchown: (target, uid, gid) => fsPromises.lchown(target, uid, gid)
  };
}
