import { ClientConfig, RemoteClient } from './remoteClient';
import { FtpClient } from './ftpClient';

export { RemoteClient, RemoteFileInfo, ClientConfig } from './remoteClient';
export { FtpClient } from './ftpClient';

/**
 * Creates an unconnected client for one endpoint
 */
export type ClientFactory = (config: ClientConfig) => RemoteClient;

/**
 * Factory function to create the appropriate client based on protocol
 */
export function createClient(config: ClientConfig): RemoteClient {
    switch (config.protocol) {
        case 'ftp':
        case 'ftps':
            return new FtpClient(config);
    }
}
