import { IDataSourceConfig } from './types'

export const DEFAULT_CONFIG: IDataSourceConfig = {
    timeout: 1000,      // after x ms a connect or a read without data fails
    maxKeySize: 250,    // max key size allowed by Memcached
    maxValue: 1048576,  // max length of value allowed by Memcached
    reconnect: true,    // one reconnect and one retry per command
    debug: false,       // output the commands and responses
    logger: console,
}
