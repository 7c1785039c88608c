/**
 * Identity of the process a runner manages. Carried through unexamined and
 * exposed to every hook callback.
 */
export interface AppInfo {
  readonly id: string
  readonly name: string
  readonly version: string
  readonly endpoints: readonly string[]
}
