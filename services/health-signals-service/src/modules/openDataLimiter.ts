import Bottleneck from "bottleneck";

/**
 * Socrata throttles requests without an app token by IP;
 * one page per second keeps a full pagination pass well under that.
 */
export const openDataLimiter = new Bottleneck({
  maxConcurrent: 1,
  minTime: 1_000,
});
