/** A lab device as the JSON-RPC based checks address it. */
export interface DeviceTarget {
  /** Short name used in reports and cutsheets, e.g. leaf1. */
  readonly device: string;
  /** Hostname the JSON-RPC endpoint answers on, e.g. clab-poc-leaf1. */
  readonly host: string;
}
