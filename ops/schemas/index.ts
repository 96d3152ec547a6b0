/**
 * Example operator catalog. Importing this module registers every schema
 * below in the process-wide registry.
 */
import "./adam";
import "./cast";
import "./copy";

export { elementwiseCost, unaryElementwise } from "./elementwise";
