import {access, mkdir, readFile, writeFile} from 'node:fs/promises';

export const DataFileSystemToken = Symbol('DataFileSystem');

/**
 * 保存ファイルへのアクセス口
 *
 * JsonFileBankStateAdapter はこのインターフェース越しにだけファイルに触る。
 * テストではフェイクに差し替えて、一時的な失敗やエラーコードを再現する。
 */
export interface DataFileSystem {
    /**
     * パスが存在するか
     * 存在しないこと（ENOENT / ENOTDIR）以外の失敗は例外として投げる
     */
    exists(path: string): Promise<boolean>;

    readText(path: string): Promise<string>;

    writeText(path: string, content: string): Promise<void>;

    /**
     * ディレクトリを（親も含めて）作成する。既にあれば何もしない
     */
    ensureDirectory(path: string): Promise<void>;
}

/**
 * Node.js の fs/promises による実装
 */
export class NodeDataFileSystem implements DataFileSystem {
    async exists(path: string): Promise<boolean> {
        try {
            await access(path);
            return true;
        } catch (error) {
            if (isMissingPathError(error)) {
                return false;
            }
            throw error;
        }
    }

    readText(path: string): Promise<string> {
        return readFile(path, 'utf8');
    }

    writeText(path: string, content: string): Promise<void> {
        return writeFile(path, content, 'utf8');
    }

    async ensureDirectory(path: string): Promise<void> {
        await mkdir(path, {recursive: true});
    }
}

/**
 * Node.js のエラーから errno コード（'ENOENT' など）を取り出す
 */
export function errorCodeOf(error: unknown): string | undefined {
    if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
        return error.code;
    }
    return undefined;
}

function isMissingPathError(error: unknown): boolean {
    const code = errorCodeOf(error);
    return code === 'ENOENT' || code === 'ENOTDIR';
}
