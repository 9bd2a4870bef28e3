export * from "./riot-id.dto";
