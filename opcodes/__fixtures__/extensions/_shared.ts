export const SHARED_NOTE = "helper modules are not extensions";
