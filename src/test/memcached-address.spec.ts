import { assert } from 'chai'

import { formatAddress, looksLikeAddress, parseAddress } from '../lib/address'
import { InvalidAddress } from '../lib/errors'

describe('Addresses', () => {
    it('should default to the local server', () => {
        assert.deepEqual(parseAddress(), { host: '127.0.0.1', port: 11211 })
        assert.deepEqual(parseAddress(''), { host: '127.0.0.1', port: 11211 })
    })

    it('should parse host and port forms', () => {
        assert.deepEqual(parseAddress('localhost:11212'), { host: 'localhost', port: 11212 })
        assert.deepEqual(parseAddress('cache.internal'), { host: 'cache.internal', port: 11211 })
        assert.deepEqual(parseAddress('[::1]:11213'), { host: '::1', port: 11213 })
        assert.deepEqual(parseAddress('[::1]'), { host: '::1', port: 11211 })
        assert.deepEqual(parseAddress('fe80::1'), { host: 'fe80::1', port: 11211 })
    })

    it('should treat absolute paths as unix sockets', () => {
        assert.deepEqual(parseAddress('/var/run/memcached.sock'), { path: '/var/run/memcached.sock' })
    })

    it('should reject what is not an address', () => {
        for (const text of ['localhost:0', 'localhost:65536', 'two words', 'host:port']) {
            assert.throws(() => parseAddress(text), InvalidAddress)
        }
    })

    it('should format addresses back', () => {
        assert.equal(formatAddress({ host: '::1', port: 11211 }), '[::1]:11211')
        assert.equal(formatAddress({ host: 'localhost', port: 11211 }), 'localhost:11211')
        assert.equal(formatAddress({ path: '/tmp/memcached.sock' }), '/tmp/memcached.sock')
    })

    it('should tell addresses from commands', () => {
        assert.isTrue(looksLikeAddress('localhost:11211'))
        assert.isTrue(looksLikeAddress('[::1]:11211'))
        assert.isTrue(looksLikeAddress('/tmp/memcached.sock'))
        assert.isFalse(looksLikeAddress('stats'))
        assert.isFalse(looksLikeAddress('\\s'))
    })
})
