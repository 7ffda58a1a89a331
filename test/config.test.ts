import { expect } from 'chai';
import 'mocha';
import { ConfigurationError, createConnection, parseConnectionInfo } from '../src';
import { formatAuthority } from '../src/config';

describe('createConnection', () => {
    it('should return a frozen copy with the host trimmed', () => {
        // Arrange
        const input = { host: '  models.internal ', port: 8085, protocol: 'grpc' as const, timeoutMs: 500 };

        // Act
        const connection = createConnection(input);

        // Assert
        expect(connection.host).to.equal('models.internal');
        expect(connection.port).to.equal(8085);
        expect(connection.timeoutMs).to.equal(500);
        expect(Object.isFrozen(connection)).to.be.true;
        expect(connection).to.not.equal(input);
    });

    it('should reject an empty host', () => {
        expect(() => createConnection({ host: '   ', port: 80, protocol: 'http' }))
            .to.throw(ConfigurationError, 'Connection host must not be empty');
    });

    it('should reject a host that is a URL', () => {
        expect(() => createConnection({ host: 'http://localhost', port: 80, protocol: 'http' }))
            .to.throw(ConfigurationError, 'Connection host must be a bare host name, got "http://localhost"');
    });

    it('should reject ports outside 1..65535', () => {
        for (const port of [0, 65536, 8080.5, -1]) {
            expect(() => createConnection({ host: 'localhost', port, protocol: 'grpc' }))
                .to.throw(ConfigurationError, `Connection port must be an integer between 1 and 65535, got ${port}`);
        }
    });

    it('should reject an unknown protocol', () => {
        // Arrange
        const input = JSON.parse('{"host":"localhost","port":80,"protocol":"ftp"}');

        // Act / Assert
        expect(() => createConnection(input))
            .to.throw(ConfigurationError, 'Unknown protocol "ftp", expected one of: grpc, http');
    });

    it('should reject a non-positive timeout', () => {
        expect(() => createConnection({ host: 'localhost', port: 80, protocol: 'http', timeoutMs: 0 }))
            .to.throw(ConfigurationError, 'Connection timeoutMs must be a positive integer, got 0');
    });
});

describe('parseConnectionInfo', () => {
    it('should map a snake_case block to a connection', () => {
        // Arrange
        const raw = {
            hostname: 'localhost',
            port: '8080',
            protocol: 'http',
            timeout_ms: 2500,
            tls: { enabled: true, ca_file: '/certs/ca.pem', insecure_verify: true }
        };

        // Act
        const connection = parseConnectionInfo(raw);

        // Assert
        expect(connection).to.deep.equal({
            host: 'localhost',
            port: 8080,
            protocol: 'http',
            timeoutMs: 2500,
            channelOptions: undefined,
            tls: {
                enabled: true,
                mtls: undefined,
                caFile: '/certs/ca.pem',
                certFile: undefined,
                keyFile: undefined,
                insecureVerify: true
            }
        });
    });

    it('should default the protocol to grpc and accept host in place of hostname', () => {
        const connection = parseConnectionInfo({ host: '127.0.0.1', port: 8085 });

        expect(connection.protocol).to.equal('grpc');
        expect(connection.host).to.equal('127.0.0.1');
        expect(connection.tls).to.be.undefined;
    });

    it('should carry channel options through', () => {
        const connection = parseConnectionInfo({
            hostname: 'localhost',
            port: 8085,
            options: { 'grpc.max_receive_message_length': 1024 }
        });

        expect(connection.channelOptions).to.deep.equal({ 'grpc.max_receive_message_length': 1024 });
    });

    it('should name the missing host field', () => {
        expect(() => parseConnectionInfo({ port: 8085 }))
            .to.throw(ConfigurationError, 'Invalid connection info at hostname: either hostname or host is required');
    });

    it('should reject an unknown protocol with the field path', () => {
        expect(() => parseConnectionInfo({ hostname: 'localhost', port: 8085, protocol: 'ftp' }))
            .to.throw(ConfigurationError, 'Invalid connection info at protocol:');
    });

    it('should reject a non-object', () => {
        expect(() => parseConnectionInfo('localhost:8085'))
            .to.throw(ConfigurationError, 'Invalid connection info at connection:');
    });
});

describe('formatAuthority', () => {
    it('should join host and port', () => {
        expect(formatAuthority('localhost', 8085)).to.equal('localhost:8085');
    });

    it('should bracket IPv6 literals', () => {
        expect(formatAuthority('::1', 8085)).to.equal('[::1]:8085');
        expect(formatAuthority('[::1]', 8085)).to.equal('[::1]:8085');
    });
});
