export { AssetCustody, CustodyError } from './custody.port';
export { InMemoryCustody, KycGatedCustody, InMemoryCustodyOptions } from './adapters/in-memory.custody';
