export * from "./discrepancy";
export * from "./harvester";
export * from "./stateMachine";
