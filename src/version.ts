/**
 * BokehJS release this binding is built against.
 *
 * Local and inline modes read assets laid out for this release; only remote
 * URLs carry the version in the file name.
 */
export const BOKEH_VERSION = "0.7.1";

/** Release directory on the public CDN. Must end with a slash. */
export const DEFAULT_CDN_URL = "https://cdn.bokeh.org/bokeh/release/";
