import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest'
import { Session, SessionState, type ISessionConfig } from '../lift-communication/core/Session'
import { ConnectionError, TransportError } from '../lift-communication/core/Errors'
import type { ILogger } from '../lift-communication/core/Logger'
import { MockTransportLayer, createSilentLogger } from './mocks'

describe('Session Tests', () => {
  let session: Session
  let mockTransport: MockTransportLayer
  let logger: ILogger
  let stateHistory: SessionState[] = []

  const defaultConfig: ISessionConfig = {
    url: 'ws://localhost:8439',
    connectTimeoutMs: 100,
    maxReconnectAttempts: 3,
    reconnectBaseDelayMs: 100, // Fast for testing
    maxQueuedFrames: 30,
  }

  const createSession = (config: Partial<ISessionConfig> = {}): Session => {
    const created = new Session(mockTransport, { ...defaultConfig, ...config }, logger)
    created.onStateChanged = (state) => {
      stateHistory.push(state)
    }
    return created
  }

  beforeEach(() => {
    mockTransport = new MockTransportLayer()
    logger = createSilentLogger()
    stateHistory = []
    session = createSession()
  })

  afterEach(() => {
    vi.clearAllTimers()
    vi.useRealTimers()
  })

  describe('Connecting', () => {
    it('should start in DISCONNECTED state', () => {
      expect(session.state).toBe(SessionState.DISCONNECTED)
      expect(session.droppedFrames).toBe(0)
    })

    it('should pass through CONNECTING to CONNECTED', async () => {
      await session.connect()

      expect(session.state).toBe(SessionState.CONNECTED)
      expect(stateHistory).toEqual([SessionState.CONNECTING, SessionState.CONNECTED])
    })

    it('should not reconnect the transport when already connected', async () => {
      await session.connect()
      await session.connect()

      expect(mockTransport.connectCalls).toBe(1)
    })

    it('should reject with ConnectionError when the transport fails', async () => {
      mockTransport.connectBehaviour = 'fail'

      const error = await session.connect().catch((caught: unknown) => caught)

      expect(error).toBeInstanceOf(ConnectionError)
      expect(error).toHaveProperty('message', 'Failed to connect to ws://localhost:8439: Connection refused')
      expect(session.state).toBe(SessionState.DISCONNECTED)
      expect(stateHistory).toEqual([SessionState.CONNECTING, SessionState.DISCONNECTED])
    })

    it('should time out a handshake that never completes', async () => {
      vi.useFakeTimers()
      mockTransport.connectBehaviour = 'hang'

      const assertion = expect(session.connect()).rejects.toThrow('Connecting to ws://localhost:8439 timed out after 100ms')
      await vi.advanceTimersByTimeAsync(100)
      await assertion

      expect(session.state).toBe(SessionState.DISCONNECTED)
      expect(mockTransport.disconnectCalls).toBe(1)
    })
  })

  describe('Sending and receiving', () => {
    it('should refuse to send while disconnected', () => {
      expect(() => session.send(new Uint8Array([1]))).toThrow(TransportError)
      expect(() => session.send(new Uint8Array([1]))).toThrow('Cannot send: session is DISCONNECTED')
    })

    it('should wrap transport send failures in TransportError', async () => {
      await session.connect()
      mockTransport.failSends = true

      expect(() => session.send(new Uint8Array([1]))).toThrow('Send failed: socket write failed')
    })

    it('should hand frames to the transport when connected', async () => {
      await session.connect()
      session.send(new Uint8Array([1, 2]))

      expect(mockTransport.sentMessages).toEqual([new Uint8Array([1, 2])])
    })

    it('should return received frames in arrival order, then null', async () => {
      await session.connect()
      mockTransport.simulateFrame(new Uint8Array([1]))
      mockTransport.simulateFrame(new Uint8Array([2]))

      expect(session.receive()).toEqual(new Uint8Array([1]))
      expect(session.receive()).toEqual(new Uint8Array([2]))
      expect(session.receive()).toBeNull()
    })

    it('should drop the oldest frame when the buffer is full', async () => {
      session = createSession({ maxQueuedFrames: 2 })
      await session.connect()
      mockTransport.simulateFrame(new Uint8Array([1]))
      mockTransport.simulateFrame(new Uint8Array([2]))
      mockTransport.simulateFrame(new Uint8Array([3]))

      expect(session.droppedFrames).toBe(1)
      expect(session.receive()).toEqual(new Uint8Array([2]))
      expect(session.receive()).toEqual(new Uint8Array([3]))
      expect(session.receive()).toBeNull()
    })

    it('should ignore frames while not connected', () => {
      mockTransport.simulateFrame(new Uint8Array([1]))

      expect(session.receive()).toBeNull()
    })
  })

  describe('Connection loss and close', () => {
    it('should go DISCONNECTED and discard buffered frames when the connection drops', async () => {
      await session.connect()
      mockTransport.simulateFrame(new Uint8Array([1]))
      mockTransport.simulateDisconnection()

      expect(session.state).toBe(SessionState.DISCONNECTED)
      expect(session.receive()).toBeNull()
      expect(logger.warn).toHaveBeenCalledWith('Session: connection lost (code 1006)')
    })

    it('should close through CLOSING', async () => {
      await session.connect()
      await session.close()

      expect(session.state).toBe(SessionState.DISCONNECTED)
      expect(stateHistory).toEqual([
        SessionState.CONNECTING,
        SessionState.CONNECTED,
        SessionState.CLOSING,
        SessionState.DISCONNECTED,
      ])
      expect(mockTransport.disconnectCalls).toBe(1)
    })

    it('should finish connecting and closing when the state handler throws', async () => {
      session.onStateChanged = () => {
        throw new Error('handler failed')
      }

      await session.connect()
      expect(session.state).toBe(SessionState.CONNECTED)

      await session.close()
      expect(session.state).toBe(SessionState.DISCONNECTED)
      expect(logger.error).toHaveBeenCalledWith('Session: state change handler threw: handler failed')
      expect(logger.error).toHaveBeenCalledTimes(4)
    })

    it('should allow close to be called twice', async () => {
      await session.connect()
      await session.close()
      await session.close()

      expect(session.state).toBe(SessionState.DISCONNECTED)
      expect(mockTransport.disconnectCalls).toBe(1)
    })
  })

  describe('Reconnection', () => {
    beforeEach(() => {
      vi.useFakeTimers()
    })

    it('should retry with exponential backoff until connected', async () => {
      await session.connect()
      mockTransport.simulateDisconnection()
      mockTransport.failingConnects = 2

      const reconnecting = session.reconnect()
      await vi.advanceTimersByTimeAsync(300)
      await reconnecting

      expect(session.state).toBe(SessionState.CONNECTED)
      expect(mockTransport.connectCalls).toBe(4)
      expect(logger.warn).toHaveBeenCalledWith(
        'Session: reconnect attempt 1/3 failed: Failed to connect to ws://localhost:8439: Connection refused, retrying in 100ms',
      )
      expect(logger.warn).toHaveBeenCalledWith(
        'Session: reconnect attempt 2/3 failed: Failed to connect to ws://localhost:8439: Connection refused, retrying in 200ms',
      )
    })

    it('should close a live link before reconnecting', async () => {
      await session.connect()

      await session.reconnect()

      expect(session.state).toBe(SessionState.CONNECTED)
      expect(mockTransport.disconnectCalls).toBe(1)
      expect(stateHistory).toEqual([
        SessionState.CONNECTING,
        SessionState.CONNECTED,
        SessionState.CLOSING,
        SessionState.DISCONNECTED,
        SessionState.CONNECTING,
        SessionState.CONNECTED,
      ])
    })

    it('should give up after the maximum number of attempts', async () => {
      await session.connect()
      mockTransport.simulateDisconnection()
      mockTransport.connectBehaviour = 'fail'

      const assertion = expect(session.reconnect()).rejects.toThrow('Maximum reconnect attempts (3) exceeded')
      await vi.advanceTimersByTimeAsync(300)
      await assertion

      expect(session.state).toBe(SessionState.DISCONNECTED)
      expect(mockTransport.connectCalls).toBe(4)
    })

    it('should abort a reconnect waiting in backoff when closed', async () => {
      await session.connect()
      mockTransport.simulateDisconnection()
      mockTransport.connectBehaviour = 'fail'

      const assertion = expect(session.reconnect()).rejects.toThrow('Reconnect aborted: session closed')
      await vi.advanceTimersByTimeAsync(10)
      await session.close()
      await assertion

      expect(mockTransport.connectCalls).toBe(2)
      expect(session.state).toBe(SessionState.DISCONNECTED)
    })
  })
})
