import defaultConfig from '../../relay.config'

export type RelayConfig = typeof defaultConfig

export const config: RelayConfig = { ...defaultConfig }

export const isOpenProxyMode = (cfg: RelayConfig = config) => !cfg.token.secret
