import { InvalidArgumentError, formatPortMapping, upnpClient } from '../src/index.js'
import { expect } from './fixtures/chai.js'
import { FakeGateway } from './fixtures/gateway.js'
import { SSDPResponder } from './fixtures/ssdp.js'
import type { ControlPoint } from '../src/index.js'

describe('control point', () => {
  let gateway: FakeGateway
  let responder: SSDPResponder
  let client: ControlPoint

  beforeEach(async () => {
    gateway = new FakeGateway()
    await gateway.start()

    responder = new SSDPResponder()
    responder.locations = [gateway.url('/rootDesc.xml').toString()]
    await responder.start()

    client = upnpClient({
      discoveryTimeout: 500,
      enoughResponses: 1,
      reuseIncomingPort: false,
      searchPort: responder.port
    })
  })

  afterEach(async () => {
    await client.stop()
    await responder.stop()
    await gateway.stop()
  })

  describe('unbound', () => {
    it('should refuse operations before discovery', async () => {
      await expect(client.externalIP()).to.eventually.be.rejected
        .with.property('name', 'NotDiscoveredError')
      await expect(client.routerIP()).to.eventually.be.rejected
        .with.property('name', 'NotDiscoveredError')
      await expect(client.listPortMappings()).to.eventually.be.rejected
        .with.property('name', 'NotDiscoveredError')

      expect(gateway.requests).to.be.empty
    })

    it('should validate arguments before checking for a gateway', async () => {
      await expect(client.addPortMapping(0, 80, 'TCP', 'test')).to.eventually.be.rejected
        .with.property('name', 'InvalidArgumentError')
      await expect(client.addPortMapping(8080, 65536, 'TCP', 'test')).to.eventually.be.rejected
        .with.property('name', 'InvalidArgumentError')
      await expect(client.getPortMapping(70000, 'UDP')).to.eventually.be.rejected
        .with.property('name', 'InvalidArgumentError')
      // @ts-expect-error protocol must be TCP or UDP
      await expect(client.deletePortMapping(8080, 'tcp')).to.eventually.be.rejected
        .with.property('name', 'InvalidArgumentError')
      // @ts-expect-error protocol must be TCP or UDP
      await expect(client.addPortMapping(8080, 80, 'SCTP', 'test')).to.eventually.be.rejected
        .with.property('name', 'InvalidArgumentError')
    })

    it('should reject an invalid discovery timeout', () => {
      expect(() => upnpClient({ discoveryTimeout: 0 })).to.throw(InvalidArgumentError)
      expect(() => upnpClient({ requestTimeout: -1 })).to.throw(InvalidArgumentError)
    })
  })

  describe('discovery', () => {
    it('should bind to the gateway that answers the search', async () => {
      const session = await client.discover()

      expect(session).to.have.property('location', `${gateway.origin}/rootDesc.xml`)
      expect(session).to.have.property('controlURL', `${gateway.origin}/ctl/IPConn`)
      expect(responder.searches).to.not.be.empty
    })

    it('should bind to a known location without searching', async () => {
      const session = await client.discover({
        locations: [gateway.url('/ppp.xml')]
      })

      expect(session).to.have.property('serviceType', 'urn:schemas-upnp-org:service:WANPPPConnection:1')
      expect(responder.searches).to.be.empty
    })

    it('should fail when no device answers', async () => {
      responder.locations = []

      await expect(client.discover()).to.eventually.be.rejected
        .with.property('name', 'NoDeviceFoundError')
      await expect(client.externalIP()).to.eventually.be.rejected
        .with.property('name', 'NotDiscoveredError')
    })

    it('should fail when no device is an Internet Gateway Device', async () => {
      responder.locations = [gateway.url('/no-cif.xml').toString()]

      await expect(client.discover()).to.eventually.be.rejected
        .with.property('name', 'NoValidIGDError')
    })

    it('should make operations wait for a running discovery', async () => {
      const [session, ip] = await Promise.all([
        client.discover(),
        client.externalIP()
      ])

      expect(session).to.have.property('location', `${gateway.origin}/rootDesc.xml`)
      expect(ip).to.equal('203.0.113.7')
    })

    it('should fail waiting operations when the running discovery fails', async () => {
      responder.locations = []

      await Promise.all([
        expect(client.discover()).to.eventually.be.rejected
          .with.property('name', 'NoDeviceFoundError'),
        expect(client.externalIP()).to.eventually.be.rejected
          .with.property('name', 'NoDeviceFoundError')
      ])
    })

    it('should join a running discovery', async () => {
      const [first, second] = await Promise.all([
        client.discover(),
        client.discover()
      ])

      expect(first).to.equal(second)
    })

    it('should let a joining call abort without cancelling the running discovery', async () => {
      const running = client.discover()
      const controller = new AbortController()
      const joined = client.discover({ signal: controller.signal })

      controller.abort()

      await expect(joined).to.eventually.be.rejected
        .with.property('name', 'AbortError')
      await expect(running).to.eventually.have.property('location', `${gateway.origin}/rootDesc.xml`)
      await expect(client.externalIP()).to.eventually.equal('203.0.113.7')
    })

    it('should replace the session when discovering again', async () => {
      const first = await client.discover()
      const second = await client.discover({
        locations: [gateway.url('/ppp.xml')]
      })

      expect(first).to.have.property('serviceType', 'urn:schemas-upnp-org:service:WANIPConnection:1')
      expect(second).to.have.property('serviceType', 'urn:schemas-upnp-org:service:WANPPPConnection:1')
      await expect(client.externalIP()).to.eventually.equal('203.0.113.7')
      expect(gateway.requests.at(-1)).to.have.property('path', '/ctl/PPPConn')
    })

    it('should be unbound after a failed re-discovery', async () => {
      await client.discover()

      responder.locations = []

      await expect(client.discover()).to.eventually.be.rejected
        .with.property('name', 'NoDeviceFoundError')
      await expect(client.externalIP()).to.eventually.be.rejected
        .with.property('name', 'NotDiscoveredError')
    })

    it('should cancel a running discovery when stopped', async () => {
      const result = expect(client.discover({ timeout: 5000 })).to.eventually.be.rejected
        .with.property('name', 'AbortError')

      await client.stop()
      await result

      await expect(client.externalIP()).to.eventually.be.rejected
        .with.property('name', 'NotDiscoveredError')
    })

    it('should forget the gateway when stopped', async () => {
      await client.discover()
      await client.stop()

      await expect(client.externalIP()).to.eventually.be.rejected
        .with.property('name', 'NotDiscoveredError')
    })

    it('should discover in the background', async () => {
      const background = upnpClient({
        autoDiscover: true,
        discoveryTimeout: 500,
        enoughResponses: 1,
        reuseIncomingPort: false,
        searchPort: responder.port
      })

      try {
        await expect(background.externalIP()).to.eventually.equal('203.0.113.7')
        expect(responder.searches).to.not.be.empty
      } finally {
        await background.stop()
      }
    })
  })

  describe('bound', () => {
    beforeEach(async () => {
      await client.discover()
      gateway.requests.splice(0, gateway.requests.length)
    })

    it('should read the router and LAN addresses from the session', async () => {
      await expect(client.routerIP()).to.eventually.equal('127.0.0.1')
      await expect(client.routerIP()).to.eventually.equal('127.0.0.1')
      await expect(client.lanIP()).to.eventually.equal('127.0.0.1')

      expect(gateway.requests).to.be.empty
    })

    it('should read the external IP address', async () => {
      await expect(client.externalIP()).to.eventually.equal('203.0.113.7')

      expect(gateway.actions()).to.deep.equal(['GetExternalIPAddress'])
      expect(gateway.requests[0]).to.have.property('path', '/ctl/IPConn')
    })

    it('should read the connection status', async () => {
      await expect(client.status()).to.eventually.deep.equal({
        connectionStatus: 'Connected',
        lastConnectionError: 'ERROR_NONE',
        uptime: 3600
      })
    })

    it('should read the connection type', async () => {
      await expect(client.connectionType()).to.eventually.equal('IP_Routed')
    })

    it('should read link statistics from the common interface config service', async () => {
      await expect(client.totalBytesSent()).to.eventually.equal(123456)
      await expect(client.totalBytesReceived()).to.eventually.equal(654321)
      await expect(client.totalPacketsSent()).to.eventually.equal(1200)
      await expect(client.totalPacketsReceived()).to.eventually.equal(3400)

      expect(gateway.actions()).to.deep.equal([
        'GetTotalBytesSent',
        'GetTotalBytesReceived',
        'GetTotalPacketsSent',
        'GetTotalPacketsReceived'
      ])
      expect(gateway.requests.map(req => req.path)).to.deep.equal([
        '/ctl/CmnIfCfg',
        '/ctl/CmnIfCfg',
        '/ctl/CmnIfCfg',
        '/ctl/CmnIfCfg'
      ])
    })

    it('should report a statistic the gateway cannot provide', async () => {
      gateway.statistics.NewTotalBytesSent = '-1'
      gateway.statistics.NewTotalPacketsSent = ''

      await expect(client.totalBytesSent()).to.eventually.be.rejected
        .with.property('name', 'StatisticUnavailableError')
      await expect(client.totalPacketsSent()).to.eventually.be.rejected
        .with.property('name', 'StatisticUnavailableError')
    })

    it('should read the max link bitrates', async () => {
      await expect(client.maxLinkBitrates()).to.eventually.deep.equal({
        downstream: 8000000,
        upstream: 1000000
      })
    })

    it('should add, read and delete a port mapping', async () => {
      await client.addPortMapping(8080, 80, 'TCP', 'web server', '192.168.1.10')

      await expect(client.getPortMapping(8080, 'TCP')).to.eventually.deep.equal({
        externalPort: 8080,
        internalPort: 80,
        protocol: 'TCP',
        internalClient: '192.168.1.10',
        description: 'web server',
        enabled: true,
        remoteHost: '',
        leaseDuration: 0
      })

      await client.deletePortMapping(8080, 'TCP')

      await expect(client.getPortMapping(8080, 'TCP')).to.eventually.be.rejected
        .with.property('code', 714)
      expect(gateway.mappings).to.be.empty
    })

    it('should send port mapping arguments in order', async () => {
      await client.addPortMapping(5000, 5001, 'UDP', 'game', undefined, {
        leaseDuration: 3600
      })

      const names = [...gateway.requests[0].body.matchAll(/<(New\w+)>/g)].map(match => match[1])

      expect(names).to.deep.equal([
        'NewRemoteHost',
        'NewExternalPort',
        'NewProtocol',
        'NewInternalPort',
        'NewInternalClient',
        'NewEnabled',
        'NewPortMappingDescription',
        'NewLeaseDuration'
      ])
      expect(gateway.mappings).to.deep.equal([{
        remoteHost: '',
        externalPort: 5000,
        protocol: 'UDP',
        internalPort: 5001,
        internalClient: '127.0.0.1',
        enabled: true,
        description: 'game',
        leaseDuration: 3600
      }])
    })

    it('should reject an invalid lease duration', async () => {
      await expect(client.addPortMapping(8080, 80, 'TCP', 'test', undefined, { leaseDuration: -5 })).to.eventually.be.rejected
        .with.property('name', 'InvalidArgumentError')

      expect(gateway.requests).to.be.empty
    })

    it('should report a conflicting mapping', async () => {
      await client.addPortMapping(8080, 80, 'TCP', 'first', '192.168.1.11')

      await expect(client.addPortMapping(8080, 80, 'TCP', 'second', '192.168.1.10')).to.eventually.be.rejected
        .with.property('message', '718 ConflictInMappingEntry: The port mapping entry specified conflicts with a mapping assigned previously to another client')
    })

    it('should fail to delete a mapping that does not exist', async () => {
      await expect(client.deletePortMapping(9999, 'UDP')).to.eventually.be.rejected
        .with.property('name', 'SoapFaultError')
    })

    it('should list port mappings', async () => {
      await client.addPortMapping(8080, 80, 'TCP', 'web', '192.168.1.10')
      await client.addPortMapping(2222, 22, 'TCP', 'ssh', '192.168.1.11')
      await client.addPortMapping(5000, 5000, 'UDP', 'game', '192.168.1.12', {
        leaseDuration: 60
      })

      const mappings = await client.listPortMappings()

      expect(mappings.map(formatPortMapping)).to.deep.equal([
        '8080->192.168.1.10:80 TCP for 0 -- web',
        '2222->192.168.1.11:22 TCP for 0 -- ssh',
        '5000->192.168.1.12:5000 UDP for 60 -- game'
      ])
      expect(mappings[0]).to.have.property('enabled', true)
      expect(mappings[0]).to.have.property('remoteHost', '')
    })

    it('should list no port mappings', async () => {
      await expect(client.listPortMappings()).to.eventually.deep.equal([])

      expect(gateway.actions()).to.deep.equal(['GetGenericPortMappingEntry'])
    })

    it('should end the list on a transport error', async () => {
      await client.addPortMapping(8080, 80, 'TCP', 'web', '192.168.1.10')
      gateway.malformed = true

      await expect(client.listPortMappings()).to.eventually.deep.equal([])
    })

    it('should reject a listing that is aborted', async () => {
      await client.addPortMapping(8080, 80, 'TCP', 'web', '192.168.1.10')

      const controller = new AbortController()
      controller.abort()

      await expect(client.listPortMappings({ signal: controller.signal })).to.eventually.be.rejected
        .with.property('name', 'AbortError')
    })

    it('should skip entries with an unknown protocol', async () => {
      await client.addPortMapping(8080, 80, 'TCP', 'web', '192.168.1.10')
      gateway.mappings.push({
        remoteHost: '',
        externalPort: 9000,
        protocol: 'SCTP',
        internalPort: 9000,
        internalClient: '192.168.1.10',
        enabled: true,
        description: 'garbled',
        leaseDuration: 0
      })
      await client.addPortMapping(5000, 5000, 'UDP', 'game', '192.168.1.12')

      const mappings = await client.listPortMappings()

      expect(mappings.map(formatPortMapping)).to.deep.equal([
        '8080->192.168.1.10:80 TCP for 0 -- web',
        '5000->192.168.1.12:5000 UDP for 0 -- game'
      ])
      expect(gateway.actions().filter(action => action === 'GetGenericPortMappingEntry')).to.have.lengthOf(4)
    })
  })
})
