export enum PresetName {
  mainnet = "mainnet",
  minimal = "minimal",
  gnosis = "gnosis",
}
