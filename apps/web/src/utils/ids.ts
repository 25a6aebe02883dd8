import { Types } from "mongoose";
import { HttpError } from "./httpError.js";

export function toObjectId(id: string, label = "id") {
  if (!Types.ObjectId.isValid(id)) {
    throw new HttpError(400, "BAD_REQUEST", `Invalid ${label}.`);
  }
  return new Types.ObjectId(id);
}

export function parseObjectId(id: string) {
  return Types.ObjectId.isValid(id) ? new Types.ObjectId(id) : null;
}
