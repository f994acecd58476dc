import type { FinalBundle } from "../types.js";

export class SessionResponseDto {
  status!: "success";
  metaReport!: FinalBundle;
}
