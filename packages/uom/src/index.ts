export {
  registerUnitOfMeasurement,
  type Ucum,
  ucumSchema,
  UnitOfMeasurement,
  UnitOfMeasurementBuilder,
  unitOfMeasurementSchema,
} from "./core/unit-of-measurement"
