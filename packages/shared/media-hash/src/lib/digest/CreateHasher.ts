import {createHash} from "crypto";
import {SimpleHash} from "./SimpleHash.js";

export function createSha256Hasher(): SimpleHash {
    return createHash("sha256");
}
