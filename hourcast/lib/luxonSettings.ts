import { Settings } from "luxon";

/**
 * Invalid input throws at construction; DateTime getters never return null.
 */
declare module "luxon" {
  interface TSSettings {
    throwOnInvalid: true;
  }
}

Settings.throwOnInvalid = true;
