import type { InferAttributes, Model, ModelStatic } from "sequelize";

/** Static model type returned by the `defineX(sequelize)` functions in `model/`. */
export type ModelDef<T> = ModelStatic<T & Model<InferAttributes<T & Model>>>;
