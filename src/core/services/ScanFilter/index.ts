export { admitEntry } from "./ScanFilter";
