import { DataSource } from './DataSource'
import * as Format from './format'
import { Item } from './Item'
import { Operation } from './operations'

export interface IDispatchResult {
    ok: boolean
    lines: Array<string>
}

const DETAIL_RESULT = {
    on: 'Enabled',
    off: 'Disabled',
}

/**
 * Runs one parsed operation against a DataSource and renders the output
 * lines. Errors of the DataSource are not caught here.
 */
export class Dispatcher {
    private _dataSource: DataSource

    constructor(dataSource: DataSource) {
        this._dataSource = dataSource
    }

    public async run(operation: Operation): Promise<IDispatchResult> {
        const ds = this._dataSource

        switch (operation.type) {
            case 'help':
                return done(Format.formatHelp(operation.command))

            case 'quit':
                return done([])

            case 'version':
                return done([await ds.version()])

            case 'display': {
                const items = await ds.stats('items')
                const slabs = await ds.stats('slabs')
                return done(Format.formatSlabs(items, slabs))
            }

            case 'stats':
                return done(Format.formatStats('stats', ds.serverAddress, await ds.stats()))

            case 'settings':
                return done(Format.formatStats('stats settings', ds.serverAddress, await ds.stats('settings')))

            case 'cachedump':
                return done(await ds.cachedump(operation.slabClass, operation.limit))

            case 'detaildump':
                return done(await ds.detailDump())

            case 'detail': {
                const lines = await ds.detail(operation.mode)
                return done([...lines, `${DETAIL_RESULT[operation.mode]} stats collection for detail dump.`])
            }

            case 'get': {
                const item = await Item.find(ds, operation.key)
                return done(item ? Format.formatItem(item) : [`Not found - ${operation.key}`])
            }

            case 'set': {
                const item = Item.buildForSet(operation.key, operation.value, operation.expire, operation.flags)
                const status = await item.save(ds)
                return status === 'STORED'
                    ? done(['OK'])
                    : failed([`Failed to store item. KEY ${operation.key}, VALUE ${operation.value}`])
            }

            case 'delete': {
                const status = await Item.buildForSet(operation.key, '').remove(ds)
                return status === 'DELETED'
                    ? done(['OK'])
                    : failed([`Failed to delete item. KEY ${operation.key}`])
            }

            default: {
                const _exhaustiveCheck: never = operation
                throw new Error(`Unknown operation ${JSON.stringify(_exhaustiveCheck)}`)
            }
        }
    }
}

function done(lines: Array<string>): IDispatchResult {
    return { ok: true, lines }
}

function failed(lines: Array<string>): IDispatchResult {
    return { ok: false, lines }
}
