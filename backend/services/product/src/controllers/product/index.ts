// backend/services/product/src/controllers/product/index.ts
export { list } from "./handlers/list";
export { create } from "./handlers/create";
export { findById } from "./handlers/findById";
export { update } from "./handlers/update";
export { remove } from "./handlers/remove";
