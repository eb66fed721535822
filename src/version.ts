export const VERSION = process.env.VIRTUAL_COMMITTEE_VERSION?.trim() || "0.1.0";
