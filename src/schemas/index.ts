export {
  type AuthMethod,
  AuthMethodSchema,
  type BootTargetDescriptor,
  type BootTargetDescriptorInput,
  BootTargetDescriptorSchema,
  descriptorFromRecords,
  isMultipath,
  parseDescriptor,
  parseTargetsFile,
  type TargetRecord,
  TargetRecordSchema,
  type TargetsFile,
  TargetsFileSchema,
} from "./target.js";
