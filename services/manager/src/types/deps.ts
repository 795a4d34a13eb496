import type { VmService } from "../services/vmService.js";

/** The lifecycle operations the HTTP API exposes. */
export type VmOperations = Pick<
  VmService,
  | "list"
  | "create"
  | "pause"
  | "resume"
  | "delete"
  | "deleteAll"
  | "portForward"
  | "executeInVm"
  | "status"
  | "inspect"
  | "config"
  | "find"
>;

export interface AppDeps {
  vmService: VmOperations;
}
