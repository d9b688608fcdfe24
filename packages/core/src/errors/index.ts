export {
  DatabaseError,
  FilterNotValidError,
  IntegrityError,
  NotFoundError,
  PermissionDeniedError,
} from "./catalog.js";
