import NodeEnvironment from "jest-environment-node";

/**
 * Node environment whose global Error is the host realm's Error, so that
 * errors raised by Node's built-in modules (fs.promises and the like) pass
 * `instanceof Error` checks inside the test sandbox.
 */
export default class HostErrorEnvironment extends NodeEnvironment {
  async setup(): Promise<void> {
    await super.setup();
    this.global.Error = Error;
  }
}
